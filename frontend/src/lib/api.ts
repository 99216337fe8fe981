import type { DashboardFilters, DashboardModel, OriginInput } from '../types';

const API_BASE = '';

export function dashboardParams(origin: OriginInput, filters: DashboardFilters): URLSearchParams {
  const params = new URLSearchParams();
  if (origin.kind === 'address') {
    params.set('address', origin.address.trim());
  } else {
    params.set('lat', String(origin.lat));
    params.set('lon', String(origin.lon));
  }
  params.set('bands', filters.bands.join(','));
  if (filters.general) params.set('general', '1');
  if (filters.montessori) params.set('montessori', '1');
  if (filters.support) params.set('support', '1');
  params.set('routes', filters.routes ? '1' : '0');
  if (filters.query.trim()) params.set('q', filters.query.trim());
  return params;
}

export function exportUrl(params: URLSearchParams): string {
  return `${API_BASE}/api/dashboard/export.csv?${params}`;
}

/** Pulls the `error` field out of an API error body when there is one. */
async function errorText(res: Response): Promise<string> {
  const body: unknown = await res.json().catch(() => null);
  if (body && typeof body === 'object' && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return `Request failed: ${res.status} ${res.statusText}`;
}

export async function fetchDashboard(params: URLSearchParams, signal?: AbortSignal): Promise<DashboardModel> {
  const res = await fetch(`${API_BASE}/api/dashboard?${params}`, { signal });
  if (!res.ok) throw new Error(await errorText(res));
  return (await res.json()) as DashboardModel;
}
