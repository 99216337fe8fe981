import type { RouteOverlay, SchoolMarker } from '../types';

export const UNKNOWN = '?';

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** "12.5 min / 3.4 km", or placeholders when the route is missing. */
export function routeText(route: SchoolMarker['route']): string {
  const minutes = route ? String(route.durationMin) : UNKNOWN;
  const km = route ? String(route.distanceKm) : UNKNOWN;
  return `${minutes} min / ${km} km`;
}

export function schoolPopupHtml(m: SchoolMarker): string {
  return [
    `<b>${escapeHtml(m.name)}</b>`,
    `<i>${escapeHtml(m.address)}</i>`,
    `Distance: ${m.distanceKm.toFixed(1)} km`,
    `Bike: ${routeText(m.route)}`,
    `General seats: ${m.generalSeats}`,
    `Montessori: ${m.montessoriSeats}`,
    `Support: ${m.supportSeats}`,
    `<a href="${escapeHtml(m.transitUrl)}" target="_blank" rel="noopener">Go by public transport</a>`,
  ].join('<br>');
}

export function routePopupHtml(r: RouteOverlay): string {
  return `<b>${escapeHtml(r.name)}</b><br>${r.durationMin} min<br>${r.distanceKm} km`;
}

export function schoolTooltip(m: SchoolMarker): string {
  return `${m.name} (${m.municipality}) - ${m.band}`;
}
