export interface RetryOpts {
  /** extra tries after the first */
  retries?: number;
  /** backoff base */
  baseDelayMs?: number;
  shouldRetry?: (err: unknown) => boolean;
}

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonResponse {
  ok: boolean;
  status: number;
  /** Parsed body; only read for 2xx responses. */
  body: unknown;
}

function timeoutError(): Error {
  const err = new Error('request timed out');
  err.name = 'AbortError';
  return err;
}

/**
 * One request and its JSON body under a single deadline. The timer runs until
 * the body has been read, so a stalled body fails the same way as a stalled
 * connection.
 */
export async function fetchJsonWithTimeout(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit = {},
  timeoutMs = 10000,
): Promise<JsonResponse> {
  const ctrl = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = timeoutError();
      ctrl.abort(err);
      reject(err);
    }, timeoutMs);
  });
  const read = async (): Promise<JsonResponse> => {
    const res = await fetchImpl(url, { ...init, signal: ctrl.signal });
    if (!res.ok) return { ok: false, status: res.status, body: null };
    const body: unknown = await res.json();
    return { ok: true, status: res.status, body };
  };
  try {
    return await Promise.race([read(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** Network failures, timeouts, 429 and 5xx. Bad payloads and other statuses are final. */
export function isTransient(err: unknown): boolean {
  if (err instanceof HttpStatusError) return err.status === 429 || err.status >= 500;
  if (err instanceof TypeError) return true;
  return err instanceof Error && err.name === 'AbortError';
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOpts = {}): Promise<T> {
  const { retries = 1, baseDelayMs = 800, shouldRetry = isTransient } = opts;
  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (e) {
      attempt++;
      if (attempt > retries || !shouldRetry(e)) throw e;
      // jittered backoff
      const delay = baseDelayMs * 2 ** (attempt - 1) + (baseDelayMs > 0 ? Math.random() * 200 : 0);
      await new Promise((r) => setTimeout(r, delay));
    }
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.name === 'AbortError' ? 'request timed out' : e.message;
  return String(e);
}
