import { type Logger, logger as defaultLogger } from './log.js';

export type FetchFn = (url: URL, init: RequestInit) => Promise<Response>;

/**
 * Outcome of a http request
 *
 * Transport errors, timeouts and non 2xx responses are all failures, callers only get a reason to log
 */
export type FetchResult =
  | { ok: true; url: URL; status: number; text: string }
  | { ok: false; url: URL; status?: number; reason: string };

export interface RequestOptions {
  fetch?: FetchFn;
  method?: 'GET' | 'HEAD';
  /** Per request timeout, no timeout governs a whole crawl */
  timeoutMs?: number;
  logger?: Logger;
}

export interface RetryOptions extends RequestOptions {
  /** Total number of attempts, including the first */
  attempts: number;
  /** Fixed wait between attempts */
  delayMs: number;
}

export const DefaultTimeoutMs = 30_000;

const globalFetch: FetchFn = (url, init) => fetch(url, init);

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function request(url: URL, opts: RequestOptions = {}): Promise<FetchResult> {
  const doFetch = opts.fetch ?? globalFetch;
  const method = opts.method ?? 'GET';
  try {
    const res = await doFetch(url, { method, signal: AbortSignal.timeout(opts.timeoutMs ?? DefaultTimeoutMs) });
    if (!res.ok) {
      // Release the socket
      await res.body?.cancel();
      return { ok: false, url, status: res.status, reason: `${res.status} ${res.statusText}`.trim() };
    }
    const text = method === 'HEAD' ? '' : await res.text();
    return { ok: true, url, status: res.status, text };
  } catch (e) {
    return { ok: false, url, reason: String(e) };
  }
}

/** Request a url, retrying every kind of failure the same way */
export async function requestWithRetry(url: URL, opts: RetryOptions): Promise<FetchResult & { attempts: number }> {
  const log = opts.logger ?? defaultLogger;
  const maxAttempts = Math.max(1, opts.attempts);

  let attempt = 0;
  while (true) {
    attempt++;
    const res = await request(url, opts);
    if (res.ok) return { ...res, attempts: attempt };
    if (attempt >= maxAttempts) {
      log.debug({ url: url.href, attempt, reason: res.reason }, 'fetch:failed');
      return { ...res, attempts: attempt };
    }
    log.debug({ url: url.href, attempt, maxAttempts, reason: res.reason }, 'fetch:retry');
    await sleep(opts.delayMs);
  }
}
