export const DEFAULT_FETCH_HEADERS: Record<string, string> = { 'User-Agent': 'SnowfallAlerts/1.0 (+resort snowfall monitor)' };

/** The wrapper owns the abort signal; callers bound a request through `timeoutMs` only. */
export type FetchOptions = Omit<RequestInit, 'signal'>;

export type FetchImpl = (url: string, init?: RequestInit) => Promise<Response>;
export type FetchWithTimeout = (url: string, options?: FetchOptions, timeoutMs?: number) => Promise<Response>;

const defaultFetchImpl: FetchImpl = (url, init) => globalThis.fetch(url, init);

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetchImpl: FetchImpl = defaultFetchImpl): FetchWithTimeout => async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchImpl(url, { ...options, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
};
