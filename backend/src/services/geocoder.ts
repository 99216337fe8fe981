import { z } from 'zod';
import { BoundedCache } from '../lib/boundedCache';
import { errorMessage, fetchJsonWithTimeout, type FetchLike } from '../lib/net';
import type { LatLon } from '../types';

export interface GeocoderOptions {
  url: string;
  userAgent: string;
  timeoutMs: number;
  cacheSize?: number;
  cacheTtlMs?: number;
  fetchImpl?: FetchLike;
}

const nominatimSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
  }),
);

/**
 * Free-text place lookup via OpenStreetMap Nominatim. Timeouts, HTTP errors
 * and empty results all come back as null ("not found").
 */
export class Geocoder {
  private readonly cache: BoundedCache<LatLon | null>;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: GeocoderOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.cache = new BoundedCache<LatLon | null>({ maxEntries: opts.cacheSize ?? 1000, ttlMs: opts.cacheTtlMs ?? 0 });
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  async geocode(query: string): Promise<LatLon | null> {
    const key = query.trim().toLowerCase();
    if (!key) return null;
    if (this.cache.has(key)) return this.cache.get(key) ?? null;

    const url = new URL(this.opts.url);
    url.searchParams.set('format', 'jsonv2');
    url.searchParams.set('limit', '1');
    url.searchParams.set('q', query.trim());

    let hit: LatLon | null = null;
    try {
      const res = await fetchJsonWithTimeout(
        this.fetchImpl,
        url.toString(),
        { headers: { 'User-Agent': this.opts.userAgent, Accept: 'application/json' } },
        this.opts.timeoutMs,
      );
      if (!res.ok) {
        console.warn(`[geocode] HTTP ${res.status} for "${query}"`);
        return null;
      }
      const results = nominatimSchema.parse(res.body);
      const first = results[0];
      if (first && Number.isFinite(first.lat) && Number.isFinite(first.lon)) {
        hit = { lat: first.lat, lon: first.lon };
      }
    } catch (e) {
      console.warn(`[geocode] "${query}": ${errorMessage(e)}`);
      return null;
    }
    // failures returned above stay uncached
    this.cache.set(key, hit);
    return hit;
  }
}
