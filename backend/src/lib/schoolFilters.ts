import Fuse from 'fuse.js';
import type {
  BandStatistics,
  CapacityFlag,
  DashboardSummary,
  DistanceBand,
  FilterCriteria,
  LatLon,
  SchoolRecord,
  TaggedSchool,
} from '../types';
import { bandForDistance } from './distanceBands';
import { kmBetween, roundTo } from './geoDistance';

const CAPACITY_FIELDS: Record<CapacityFlag, 'generalSeats' | 'montessoriSeats' | 'supportSeats'> = {
  general: 'generalSeats',
  montessori: 'montessoriSeats',
  support: 'supportSeats',
};

export function tagSchools(records: readonly SchoolRecord[], origin: LatLon): TaggedSchool[] {
  return records.map((r) => {
    const distanceKm = kmBetween(origin, { lat: r.lat, lon: r.lon });
    return {
      row: r.row,
      name: r.name,
      municipality: r.municipality,
      address: r.address,
      lat: r.lat,
      lon: r.lon,
      generalSeats: r.generalSeats,
      montessoriSeats: r.montessoriSeats,
      supportSeats: r.supportSeats,
      distanceKm,
      band: bandForDistance(distanceKm),
    };
  });
}

/**
 * Band, capacity and text filters composed with AND. Keeps input order, so
 * applying the same criteria again returns the same list.
 */
export function filterSchools(schools: readonly TaggedSchool[], criteria: FilterCriteria): TaggedSchool[] {
  const bands = new Set<DistanceBand>(criteria.bands);
  let out = schools.filter((s) => bands.has(s.band));

  for (const flag of Object.keys(CAPACITY_FIELDS) as CapacityFlag[]) {
    if (!criteria[flag]) continue;
    const field = CAPACITY_FIELDS[flag];
    out = out.filter((s) => s[field] > 0);
  }

  const q = criteria.query?.trim() ?? '';
  if (q && out.length) {
    const fuse = new Fuse(out, { keys: ['name', 'municipality'], threshold: 0.4 });
    const hits = new Set(fuse.search(q).map((r) => r.item));
    out = out.filter((s) => hits.has(s));
  }
  return out;
}

/** Per-band count/min/max/mean in the order of `bands`; bands without members are left out. */
export function bandStatistics(schools: readonly TaggedSchool[], bands: readonly DistanceBand[]): BandStatistics[] {
  const groups = new Map<DistanceBand, number[]>();
  for (const s of schools) {
    const g = groups.get(s.band);
    if (g) g.push(s.distanceKm);
    else groups.set(s.band, [s.distanceKm]);
  }

  const stats: BandStatistics[] = [];
  for (const band of new Set(bands)) {
    const distances = groups.get(band);
    if (!distances?.length) continue;
    const sum = distances.reduce((acc, d) => acc + d, 0);
    stats.push({
      band,
      count: distances.length,
      minKm: roundTo(Math.min(...distances), 2),
      maxKm: roundTo(Math.max(...distances), 2),
      meanKm: roundTo(sum / distances.length, 2),
    });
  }
  return stats;
}

export function summarize(schools: readonly TaggedSchool[]): DashboardSummary {
  const total = schools.length;
  const meanDistanceKm =
    total > 0 ? roundTo(schools.reduce((acc, s) => acc + s.distanceKm, 0) / total, 1) : null;
  return {
    total,
    meanDistanceKm,
    withGeneralSeats: schools.filter((s) => s.generalSeats > 0).length,
    withMontessoriSeats: schools.filter((s) => s.montessoriSeats > 0).length,
    withSupportSeats: schools.filter((s) => s.supportSeats > 0).length,
  };
}
