import { describe, it, expect, vi, afterEach } from 'vitest';
import type { DashboardFilters } from '../types';
import { dashboardParams, exportUrl, fetchDashboard } from './api';

const FILTERS: DashboardFilters = {
  bands: ['0-10 km', '20+ km'],
  general: true,
  montessori: false,
  support: true,
  routes: false,
  query: '',
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('dashboardParams', () => {
  it('encodes an address origin and the active filters', () => {
    expect(dashboardParams({ kind: 'address', address: ' Brugherio ' }, FILTERS).toString()).toBe(
      'address=Brugherio&bands=0-10+km%2C20%2B+km&general=1&support=1&routes=0',
    );
  });

  it('encodes a coordinate origin, an empty band set and a search query', () => {
    const params = dashboardParams(
      { kind: 'coordinates', lat: 45.5531, lon: 9.3012 },
      { ...FILTERS, bands: [], general: false, support: false, routes: true, query: ' Monza ' },
    );
    expect(params.toString()).toBe('lat=45.5531&lon=9.3012&bands=&routes=1&q=Monza');
  });
});

describe('exportUrl', () => {
  it('points at the CSV endpoint with the same parameters', () => {
    const params = new URLSearchParams({ address: 'Monza', bands: '10-20 km' });
    expect(exportUrl(params)).toBe('/api/dashboard/export.csv?address=Monza&bands=10-20+km');
  });
});

describe('fetchDashboard', () => {
  it('returns the parsed model', async () => {
    const model = { bands: [], markers: [] };
    const fetchMock = vi.fn(async () => new Response(JSON.stringify(model), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    await expect(fetchDashboard(new URLSearchParams({ address: 'Monza' }))).resolves.toEqual(model);
    expect(fetchMock).toHaveBeenCalledWith('/api/dashboard?address=Monza', { signal: undefined });
  });

  it('surfaces the API error message', async () => {
    const body = { error: 'Address not found, correct it and try again.', code: 'ORIGIN_NOT_FOUND' };
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify(body), { status: 422 })));
    await expect(fetchDashboard(new URLSearchParams())).rejects.toThrow('Address not found, correct it and try again.');
  });

  it('falls back to the status line for non-JSON errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('oops', { status: 500, statusText: 'Internal Server Error' })),
    );
    await expect(fetchDashboard(new URLSearchParams())).rejects.toThrow('Request failed: 500 Internal Server Error');
  });
});
