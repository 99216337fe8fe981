/**
 * One pass of the dashboard: resolve the origin, tag and filter the schools,
 * fetch routes for what is left and assemble the render model. Everything the
 * pass depends on comes in through `config` and `deps`.
 */

import { bandColor } from '../lib/distanceBands';
import { roundTo } from '../lib/geoDistance';
import { mapWithConcurrency } from '../lib/pool';
import { bandStatistics, filterSchools, summarize, tagSchools } from '../lib/schoolFilters';
import { OriginNotFoundError } from '../errors';
import type {
  DashboardConfig,
  DashboardModel,
  LatLon,
  Origin,
  RouteOverlay,
  RouteResult,
  SchoolMarker,
  SchoolRecord,
  TableRow,
  TaggedSchool,
} from '../types';
import type { Geocoder } from './geocoder';
import type { RouteFetcher } from './routeFetcher';

export interface DashboardDeps {
  schools: readonly SchoolRecord[];
  geocoder: Pick<Geocoder, 'geocode'>;
  routeFetcher: Pick<RouteFetcher, 'fetchRoute'>;
  routing: { apiKey: string; concurrency: number };
}

export async function resolveOrigin(
  origin: Origin,
  geocoder: Pick<Geocoder, 'geocode'>,
): Promise<LatLon & { label: string }> {
  if (origin.kind === 'coordinates') {
    return { lat: origin.lat, lon: origin.lon, label: `${origin.lat}, ${origin.lon}` };
  }
  const hit = await geocoder.geocode(origin.address);
  if (!hit) throw new OriginNotFoundError(origin.address);
  return { ...hit, label: origin.address.trim() };
}

export function transitUrl(from: LatLon, to: LatLon): string {
  return (
    'https://www.google.com/maps/dir/?api=1' +
    `&origin=${from.lat},${from.lon}` +
    `&destination=${to.lat},${to.lon}` +
    '&travelmode=transit'
  );
}

function toMarker(s: TaggedSchool, origin: LatLon, route: RouteResult | null): SchoolMarker {
  return {
    row: s.row,
    name: s.name,
    municipality: s.municipality,
    address: s.address,
    lat: s.lat,
    lon: s.lon,
    distanceKm: s.distanceKm,
    band: s.band,
    color: bandColor(s.band),
    generalSeats: s.generalSeats,
    montessoriSeats: s.montessoriSeats,
    supportSeats: s.supportSeats,
    route: route ? { durationMin: route.durationMin, distanceKm: route.distanceKm } : null,
    transitUrl: transitUrl(origin, s),
  };
}

function toTableRow(m: SchoolMarker): TableRow {
  return {
    name: m.name,
    municipality: m.municipality,
    address: m.address,
    distanceKm: roundTo(m.distanceKm, 2),
    cyclingDistanceKm: m.route?.distanceKm ?? null,
    band: m.band,
    generalSeats: m.generalSeats,
    montessoriSeats: m.montessoriSeats,
    supportSeats: m.supportSeats,
  };
}

export async function buildDashboard(config: DashboardConfig, deps: DashboardDeps): Promise<DashboardModel> {
  const origin = await resolveOrigin(config.origin, deps.geocoder);
  const bands = [...new Set(config.filters.bands)];
  const warnings: string[] = [];

  const tagged = tagSchools(deps.schools, origin);
  const retained = filterSchools(tagged, { ...config.filters, bands });
  // markers follow the order of the selected bands, then file order
  const ordered = bands.flatMap((b) => retained.filter((s) => s.band === b));

  let routes: (RouteResult | null)[] = ordered.map(() => null);
  if (config.routes.enabled && ordered.length) {
    if (!deps.routing.apiKey) {
      warnings.push('Routes skipped: no routing API key configured (ORS_API_KEY).');
    } else {
      const report = (message: string) => {
        console.warn(`[routes] ${message}`);
        warnings.push(message);
      };
      routes = await mapWithConcurrency(ordered, deps.routing.concurrency, (s) =>
        deps.routeFetcher.fetchRoute(
          {
            start: { lat: origin.lat, lon: origin.lon },
            end: { lat: s.lat, lon: s.lon },
            municipality: s.municipality,
            profile: config.routes.profile,
            apiKey: deps.routing.apiKey,
          },
          report,
        ),
      );
    }
  }

  const markers = ordered.map((s, i) => toMarker(s, origin, routes[i]));
  const overlays: RouteOverlay[] = [];
  ordered.forEach((s, i) => {
    const r = routes[i];
    if (!r) return;
    overlays.push({
      row: s.row,
      name: s.name,
      color: bandColor(s.band),
      points: r.points,
      durationMin: r.durationMin,
      distanceKm: r.distanceKm,
    });
  });

  const table = markers
    .map(toTableRow)
    .sort((a, b) => a.distanceKm - b.distanceKm);

  return {
    origin,
    bands,
    summary: summarize(retained),
    markers,
    routes: overlays,
    statistics: bandStatistics(retained, bands),
    table,
    warnings,
  };
}
