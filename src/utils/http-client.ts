export const DEFAULT_FETCH_HEADERS = { 'User-Agent': 'TrailWeatherEngine/1.0 (+https://example.org/trail-weather)' };

export type FetchWithTimeout = (url: string, options?: RequestInit, timeoutMs?: number) => Promise<Response>;

export const createFetchWithTimeout =
  (defaultTimeoutMs: number, fetchImpl: typeof fetch = globalThis.fetch): FetchWithTimeout =>
  async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
    const controller = new AbortController();
    const upstreamSignal = options.signal;
    const abortFromUpstream = () => {
      controller.abort(upstreamSignal?.reason);
    };
    if (upstreamSignal) {
      if (upstreamSignal.aborted) {
        abortFromUpstream();
      } else {
        upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
      }
    }
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchImpl(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };
