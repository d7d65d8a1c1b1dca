export const DEFAULT_FETCH_HEADERS: Record<string, string> = { 'User-Agent': 'OffshoreWindConditions/1.0' };

export interface FetchOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, options?: FetchOptions) => Promise<FetchResponse>;

export type FetchWithTimeout = (url: string, options?: FetchOptions, timeoutMs?: number) => Promise<FetchResponse>;

const fetchImpl: FetchLike = (url, options) => globalThis.fetch(url, options);

export const createFetchWithTimeout =
  (defaultTimeoutMs: number, fetcher: FetchLike = fetchImpl): FetchWithTimeout =>
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
      return await fetcher(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };
