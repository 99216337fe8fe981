import { describe, it, expect, vi } from 'vitest';
import { errorMessage, fetchJsonWithTimeout, HttpStatusError, isTransient, withRetry } from './net';

describe('isTransient', () => {
  it('retries network failures, timeouts, 429 and 5xx only', () => {
    expect(isTransient(new TypeError('fetch failed'))).toBe(true);
    expect(isTransient(new DOMException('aborted', 'AbortError'))).toBe(true);
    expect(isTransient(new HttpStatusError(503, 'HTTP 503'))).toBe(true);
    expect(isTransient(new HttpStatusError(429, 'HTTP 429'))).toBe(true);
    expect(isTransient(new HttpStatusError(403, 'HTTP 403'))).toBe(false);
    expect(isTransient(new SyntaxError('Unexpected token'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('tries again after a transient failure', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce('ok');
    await expect(withRetry(fn, { retries: 2, baseDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry a final failure', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new HttpStatusError(401, 'HTTP 401'));
    await expect(withRetry(fn, { retries: 3, baseDelayMs: 0 })).rejects.toThrow('HTTP 401');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured retries', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new HttpStatusError(502, 'HTTP 502'));
    await expect(withRetry(fn, { retries: 2, baseDelayMs: 0 })).rejects.toThrow('HTTP 502');
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('fetchJsonWithTimeout', () => {
  it('aborts a request that takes too long', async () => {
    const hang = (_url: string, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('aborted', 'AbortError')));
      });
    const err = await fetchJsonWithTimeout(hang, 'https://slow.test', {}, 5).catch((e: unknown) => e);
    expect(errorMessage(err)).toBe('request timed out');
  });

  it('times out a body that never finishes', async () => {
    const stalled = async () => new Response(new ReadableStream({ start() {} }), { status: 200 });
    const err = await fetchJsonWithTimeout(stalled, 'https://slow.test', {}, 20).catch((e: unknown) => e);
    expect(errorMessage(err)).toBe('request timed out');
  });

  it('returns the parsed body of a successful response', async () => {
    const ok = async () => new Response('{"a":1}', { status: 200 });
    await expect(fetchJsonWithTimeout(ok, 'https://fast.test')).resolves.toEqual({ ok: true, status: 200, body: { a: 1 } });
  });

  it('does not read the body of an error response', async () => {
    const fail = async () => new Response(new ReadableStream({ start() {} }), { status: 502 });
    await expect(fetchJsonWithTimeout(fail, 'https://fast.test', {}, 1000)).resolves.toEqual({
      ok: false,
      status: 502,
      body: null,
    });
  });
});
