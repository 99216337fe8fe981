import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FetchLike } from '../lib/net';
import { Geocoder } from './geocoder';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function makeGeocoder(fetchImpl: FetchLike, timeoutMs = 1000): Geocoder {
  return new Geocoder({ url: 'https://geo.test/search', userAgent: 'school-map-tests', timeoutMs, fetchImpl });
}

describe('Geocoder', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the first hit as numbers', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(
      jsonResponse([
        { lat: '45.5531', lon: '9.3012', display_name: 'Brugherio' },
        { lat: '1', lon: '2' },
      ]),
    );
    await expect(makeGeocoder(fetchImpl).geocode('Brugherio')).resolves.toEqual({ lat: 45.5531, lon: 9.3012 });

    const [url, init] = fetchImpl.mock.calls[0];
    const params = new URL(url).searchParams;
    expect(params.get('q')).toBe('Brugherio');
    expect(params.get('format')).toBe('jsonv2');
    expect(params.get('limit')).toBe('1');
    expect(init?.headers).toEqual({ 'User-Agent': 'school-map-tests', Accept: 'application/json' });
  });

  it('caches answers by normalized query', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse([{ lat: '45.59', lon: '9.27' }]));
    const g = makeGeocoder(fetchImpl);
    await g.geocode('Monza');
    await expect(g.geocode('  monza ')).resolves.toEqual({ lat: 45.59, lon: 9.27 });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('treats an empty result as not found and remembers it', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonResponse([]));
    const g = makeGeocoder(fetchImpl);
    await expect(g.geocode('Nowhere Town')).resolves.toBeNull();
    await expect(g.geocode('Nowhere Town')).resolves.toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('returns null on HTTP errors without caching', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(new Response('busy', { status: 503 }));
    const g = makeGeocoder(fetchImpl);
    await expect(g.geocode('Lecco')).resolves.toBeNull();
    await expect(g.geocode('Lecco')).resolves.toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('returns null when the lookup times out', async () => {
    const hang: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
      });
    await expect(makeGeocoder(hang, 5).geocode('Como')).resolves.toBeNull();
    expect(console.warn).toHaveBeenCalledWith('[geocode] "Como": request timed out');
  });

  it('does not call the service for a blank query', async () => {
    const fetchImpl = vi.fn<FetchLike>();
    await expect(makeGeocoder(fetchImpl).geocode('   ')).resolves.toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('returns null when the response body stalls', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockImplementation(async () => new Response(new ReadableStream({ start() {} }), { status: 200 }));
    await expect(makeGeocoder(fetchImpl, 20).geocode('Brugherio')).resolves.toBeNull();
    expect(console.warn).toHaveBeenCalledWith('[geocode] "Brugherio": request timed out');
  });

  it('keeps at most cacheSize answers', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockImplementation(async () => jsonResponse([{ lat: '45.5', lon: '9.3' }]));
    const g = new Geocoder({
      url: 'https://geo.test/search',
      userAgent: 'school-map-tests',
      timeoutMs: 1000,
      cacheSize: 2,
      fetchImpl,
    });
    await g.geocode('Monza');
    await g.geocode('Lecco');
    await g.geocode('Como');
    expect(g.cacheSize).toBe(2);

    await g.geocode('Monza');
    expect(fetchImpl).toHaveBeenCalledTimes(4);
  });
});
