/**
 * openrouteservice directions client.
 *
 * Every call resolves: a failed route is reported through the caller's
 * `report` channel and comes back as null. Outcomes (failures included) are
 * memoized per (start, end, municipality, profile, key) in a bounded cache,
 * so identical requests reach the service once while the entry lives.
 */

import { z } from 'zod';
import { BoundedCache } from '../lib/boundedCache';
import { roundTo } from '../lib/geoDistance';
import { errorMessage, fetchJsonWithTimeout, HttpStatusError, withRetry, type FetchLike } from '../lib/net';
import { decodePolyline } from '../lib/polyline';
import type { LatLon, RouteProfile, RouteResult } from '../types';

export interface RouteRequest {
  start: LatLon;
  end: LatLon;
  /** Label used in failure messages; part of the cache key. */
  municipality: string;
  profile: RouteProfile;
  apiKey: string;
}

export interface RouteFetcherOptions {
  baseUrl: string;
  timeoutMs: number;
  retries: number;
  baseDelayMs?: number;
  cacheSize?: number;
  cacheTtlMs?: number;
  fetchImpl?: FetchLike;
}

export const DEFAULT_CACHE_SIZE = 5000;
export const DEFAULT_CACHE_TTL_MS = 6 * 60 * 60 * 1000;

export type RouteReporter = (message: string) => void;

type RouteOutcome = { ok: true; route: RouteResult } | { ok: false; reason: string };

const directionsSchema = z.object({
  routes: z.array(
    z.object({
      // the service omits zero-valued summary fields
      summary: z.object({
        distance: z.number().default(0),
        duration: z.number().default(0),
      }),
      geometry: z.string(),
    }),
  ),
});

const warnToConsole: RouteReporter = (message) => console.warn(`[routes] ${message}`);

export class RouteFetcher {
  private readonly outcomes: BoundedCache<Promise<RouteOutcome>>;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: RouteFetcherOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.outcomes = new BoundedCache<Promise<RouteOutcome>>({
      maxEntries: opts.cacheSize ?? DEFAULT_CACHE_SIZE,
      ttlMs: opts.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
    });
  }

  static cacheKey(req: RouteRequest): string {
    return JSON.stringify([req.start.lat, req.start.lon, req.end.lat, req.end.lon, req.municipality, req.profile, req.apiKey]);
  }

  get cacheSize(): number {
    return this.outcomes.size;
  }

  async fetchRoute(req: RouteRequest, report: RouteReporter = warnToConsole): Promise<RouteResult | null> {
    const key = RouteFetcher.cacheKey(req);
    let pending = this.outcomes.get(key);
    if (!pending) {
      pending = this.request(req);
      this.outcomes.set(key, pending);
    }
    const outcome = await pending;
    if (outcome.ok) return outcome.route;
    report(`Route calculation failed for ${req.municipality}: ${outcome.reason}`);
    return null;
  }

  private async request(req: RouteRequest): Promise<RouteOutcome> {
    try {
      const route = await withRetry(() => this.requestOnce(req), {
        retries: this.opts.retries,
        baseDelayMs: this.opts.baseDelayMs,
      });
      return { ok: true, route };
    } catch (e) {
      return { ok: false, reason: errorMessage(e) };
    }
  }

  private async requestOnce(req: RouteRequest): Promise<RouteResult> {
    const url = `${this.opts.baseUrl}/v2/directions/${encodeURIComponent(req.profile)}`;
    const res = await fetchJsonWithTimeout(
      this.fetchImpl,
      url,
      {
        method: 'POST',
        headers: {
          Authorization: req.apiKey,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        // the service takes longitude first
        body: JSON.stringify({
          coordinates: [
            [req.start.lon, req.start.lat],
            [req.end.lon, req.end.lat],
          ],
        }),
      },
      this.opts.timeoutMs,
    );
    if (!res.ok) throw new HttpStatusError(res.status, `HTTP ${res.status}`);

    const body = directionsSchema.parse(res.body);
    const first = body.routes[0];
    if (!first) throw new Error('no route returned');
    return {
      points: decodePolyline(first.geometry),
      durationMin: roundTo(first.summary.duration / 60, 1),
      distanceKm: roundTo(first.summary.distance / 1000, 1),
    };
  }
}
