import { z } from 'zod';
import { routeProfileSchema } from '../config';
import { ValidationError } from '../errors';
import { isDistanceBand } from '../lib/distanceBands';
import type { DashboardConfig, DistanceBand, Origin, RouteProfile } from '../types';

export const DEFAULT_BANDS: DistanceBand[] = ['0-10 km'];

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const coordinate = (min: number, max: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().min(min).max(max).optional());

const flag = z
  .enum(['1', '0', 'true', 'false'])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === '1' || v === 'true'));

export const dashboardQuerySchema = z.object({
  address: z.string().trim().optional(),
  lat: coordinate(-90, 90),
  lon: coordinate(-180, 180),
  bands: z.string().optional(),
  general: flag,
  montessori: flag,
  support: flag,
  routes: flag,
  profile: routeProfileSchema.optional(),
  q: z.string().trim().max(200).optional(),
});

export type DashboardQuery = z.infer<typeof dashboardQuerySchema>;

/** Omitted = default band; present but empty = no bands. */
export function parseBands(raw: string | undefined): DistanceBand[] {
  if (raw === undefined) return [...DEFAULT_BANDS];
  const labels = raw.split(',').map((b) => b.trim()).filter(Boolean);
  const unknown = labels.filter((b) => !isDistanceBand(b));
  if (unknown.length) {
    throw new ValidationError(`Unknown distance band: ${unknown.join(', ')}`, { bands: unknown });
  }
  return labels.filter(isDistanceBand);
}

function parseOrigin(q: DashboardQuery): Origin {
  if (q.lat !== undefined && q.lon !== undefined) return { kind: 'coordinates', lat: q.lat, lon: q.lon };
  if (q.lat !== undefined || q.lon !== undefined) {
    throw new ValidationError('Both lat and lon are required for a coordinate origin');
  }
  if (q.address) return { kind: 'address', address: q.address };
  throw new ValidationError('Provide an address or lat and lon as the starting point');
}

export function parseDashboardQuery(query: unknown, defaultProfile: RouteProfile): DashboardConfig {
  const parsed = dashboardQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError('Invalid query parameters', {
      fields: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  const q = parsed.data;
  return {
    origin: parseOrigin(q),
    filters: {
      bands: parseBands(q.bands),
      general: q.general ?? false,
      montessori: q.montessori ?? false,
      support: q.support ?? false,
      query: q.q || undefined,
    },
    routes: { enabled: q.routes ?? true, profile: q.profile ?? defaultProfile },
  };
}
