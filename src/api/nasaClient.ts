import { NetworkError, RateLimitedError, UpstreamError } from './errors';

export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

type RequestParams = Record<string, string | number | undefined>;

export type RequestOptions = RequestInit & { timeoutMs?: number; fetchImpl?: FetchLike };

export interface JsonResponse {
  /** Request URL with the api_key value redacted. */
  url: string;
  status: number;
  text: string;
  /** Parsed JSON, or the raw text when the body is not JSON. */
  data: unknown;
}

export function buildUrl(endpoint: string, params: RequestParams = {}): string {
  const url = new URL(endpoint);
  for (const [k, v] of Object.entries(params)) {
    if (v === undefined) continue;
    url.searchParams.set(k, String(v));
  }
  return url.toString();
}

function createTimeoutSignal(timeoutMs: number) {
  let timedOut = false;
  const signal = AbortSignal.timeout(timeoutMs);
  const onAbort = () => {
    timedOut = true;
  };
  signal.addEventListener('abort', onAbort, { once: true });
  return {
    signal,
    cleanup: () => signal.removeEventListener('abort', onAbort),
    didTimeout: () => timedOut,
  };
}

function mergeAbortSignals(signals: AbortSignal[]): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const unlisteners: Array<() => void> = [];

  const cleanup = () => {
    while (unlisteners.length) {
      const off = unlisteners.pop();
      if (off) off();
    }
  };

  const abortFrom = (signal: AbortSignal) => {
    if (controller.signal.aborted) return;
    cleanup();
    controller.abort(signal.reason);
  };

  for (const signal of signals) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }
    const handler = () => abortFrom(signal);
    signal.addEventListener('abort', handler, { once: true });
    unlisteners.push(() => signal.removeEventListener('abort', handler));
  }

  return { signal: controller.signal, cleanup };
}

function parseBody(text: string): unknown {
  if (!text) return text;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Single GET against an absolute endpoint. Resolves for 2xx responses only;
 * 429 becomes {@link RateLimitedError}, other statuses {@link UpstreamError},
 * and transport failures (including the timeout) {@link NetworkError}.
 */
export async function request(
  endpoint: string,
  params: RequestParams = {},
  init?: RequestOptions,
): Promise<JsonResponse> {
  const url = buildUrl(endpoint, params);
  const safeUrl = redactKey(url);
  const {
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetchImpl = fetch,
    signal: externalSignal,
    headers: initHeaders,
    ...restInit
  } = init ?? {};

  const cleanups: Array<() => void> = [];
  const signals: AbortSignal[] = [];
  let didTimeout = () => false;

  if (timeoutMs > 0) {
    const timeout = createTimeoutSignal(timeoutMs);
    signals.push(timeout.signal);
    cleanups.push(timeout.cleanup);
    didTimeout = timeout.didTimeout;
  }

  if (externalSignal) {
    signals.push(externalSignal);
  }

  let signal: AbortSignal | undefined;
  if (signals.length === 1) {
    signal = signals[0];
  } else if (signals.length > 1) {
    const merged = mergeAbortSignals(signals);
    signal = merged.signal;
    cleanups.push(merged.cleanup);
  }

  const headers = new Headers(initHeaders);
  if (!headers.has('Accept')) {
    headers.set('Accept', 'application/json');
  }

  const requestInit: RequestInit = { ...restInit, headers, signal, method: 'GET' };

  try {
    let resp: Response;
    let text: string;
    try {
      resp = await fetchImpl(url, requestInit);
      text = await resp.text();
    } catch (error) {
      if (externalSignal?.aborted && !didTimeout()) throw error;
      throw new NetworkError(safeUrl, didTimeout(), error);
    }

    if (resp.status === 429) {
      throw new RateLimitedError(safeUrl, text, resp.headers.get('Retry-After'));
    }
    if (!resp.ok) throw new UpstreamError(safeUrl, resp.status, text);

    return { url: safeUrl, status: resp.status, text, data: parseBody(text) };
  } catch (error) {
    if (error instanceof RateLimitedError) {
      // eslint-disable-next-line no-console
      console.warn('[apodClient] rate limited', { url: safeUrl, retryAfter: error.retryAfter });
    } else {
      // eslint-disable-next-line no-console
      console.error('[apodClient] request failed', { url: safeUrl, err: error });
    }
    throw error;
  } finally {
    for (const cleanup of cleanups) cleanup();
  }
}

/** Hides the api_key query value so URLs can travel in errors and logs. */
export function redactKey(url: string): string {
  const parsed = new URL(url);
  if (parsed.searchParams.has('api_key')) parsed.searchParams.set('api_key', '***');
  return parsed.toString();
}
