import { type FetchFn, requestWithRetry } from './http.js';
import { type Logger, logger as defaultLogger } from './log.js';
import { ConcurrentQueue } from './queue.js';

export type ErddapProtocol = 'griddap' | 'tabledap';

export interface AvailabilityResult {
  url: string;
  /** The url that was actually requested */
  endpoint: string;
  ok: boolean;
  status?: number;
  reason?: string;
  attempts: number;
}

export interface AvailabilityOptions {
  fetch?: FetchFn;
  attempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  concurrency?: number;
  logger?: Logger;
}

/** Grid unless the url says otherwise, plain OPeNDAP urls are checked like griddap */
export function erddapProtocol(url: string): ErddapProtocol {
  if (url.includes('/tabledap/')) return 'tabledap';
  return 'griddap';
}

/** Metadata endpoint that answers quickly for a dataset url */
export function metadataUrl(url: string): string {
  const base = url.trim().replace(/\.html$/, '');
  if (erddapProtocol(base) === 'tabledap') return base + '.nccsvMetadata';
  return base + '.das';
}

export async function checkUrl(url: string, opts: AvailabilityOptions = {}): Promise<AvailabilityResult> {
  const log = opts.logger ?? defaultLogger;
  const endpoint = metadataUrl(url);

  let target: URL;
  try {
    target = new URL(endpoint);
  } catch {
    log.warn({ url }, 'check:url:invalid');
    return { url, endpoint, ok: false, reason: 'Invalid url', attempts: 0 };
  }

  const res = await requestWithRetry(target, {
    fetch: opts.fetch,
    method: 'HEAD',
    attempts: opts.attempts ?? 3,
    delayMs: opts.retryDelayMs ?? 2000,
    timeoutMs: opts.timeoutMs ?? 10_000,
    logger: log,
  });

  if (res.ok) {
    log.debug({ url, endpoint, attempts: res.attempts }, 'check:url:ok');
    return { url, endpoint, ok: true, status: res.status, attempts: res.attempts };
  }
  log.warn({ url, endpoint, attempts: res.attempts, status: res.status, reason: res.reason }, 'check:url:failed');
  return { url, endpoint, ok: false, status: res.status, reason: res.reason, attempts: res.attempts };
}

/** Check many urls with a bounded pool, results come back in input order */
export async function checkUrls(urls: string[], opts: AvailabilityOptions = {}): Promise<AvailabilityResult[]> {
  const q = new ConcurrentQueue(opts.concurrency ?? 10);
  const results = await Promise.all(urls.map((url) => q.push(() => checkUrl(url, opts))));
  return results.map(
    (r, i): AvailabilityResult => r ?? { url: urls[i], endpoint: metadataUrl(urls[i]), ok: false, reason: 'Cancelled', attempts: 0 },
  );
}

function csvField(value: string): string {
  if (/[",\n]/.test(value)) return `"${value.replaceAll('"', '""')}"`;
  return value;
}

export function availabilityCsv(results: AvailabilityResult[]): string {
  const lines = ['url,endpoint,accessible'];
  for (const r of results) lines.push([csvField(r.url), csvField(r.endpoint), String(r.ok)].join(','));
  return lines.join('\n') + '\n';
}
