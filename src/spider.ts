import { type CatalogPage, type CatalogReader } from './catalog/catalog.js';
import { fetchDasMetadata } from './das.js';
import { type DatasetRecord } from './dataset.js';
import { DefaultTimeoutMs, type FetchFn, request, sleep } from './http.js';
import { type Logger, logger as defaultLogger } from './log.js';
import { ConcurrentQueue } from './queue.js';

/** A catalog waiting to be fetched, root catalog is depth 0 */
export interface CatalogNode {
  url: URL;
  depth: number;
}

export interface SpiderEvents {
  /** Return `false` from a listener to stop the spider descending into this catalog's children */
  catalog: [CatalogPage, CatalogNode];
  dataset: [DatasetRecord];
  metadata: [DatasetRecord, boolean];
  empty: [];
  end: [];
}

type Listener<T extends keyof SpiderEvents> = (...args: SpiderEvents[T]) => Promise<unknown>;

export interface SpiderOptions {
  reader: CatalogReader;
  /** Deepest catalog level that is still fetched, default 5 */
  maxDepth?: number;
  /** Workers fetching catalogs, default 5 */
  catalogConcurrency?: number;
  /** Workers fetching DAS documents, default 10 */
  metadataConcurrency?: number;
  /** Pause after every catalog fetch, to go easy on the origin server */
  delayMs?: number;
  /** Attempts per DAS document, default 3 */
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  fetch?: FetchFn;
  logger?: Logger;
  /** Aborting closes the queues, work already running finishes and everything queued is skipped */
  signal?: AbortSignal;
}

export const DefaultMaxDepth = 5;

export class CatalogSpider {
  events: { [K in keyof SpiderEvents]?: Listener<K>[] } = {};
  /** Shallowest depth each catalog url was queued at */
  seen = new Map<string, number>();
  datasetUrls = new Set<string>();
  datasets: DatasetRecord[] = [];
  stats = { catalogs: 0, failed: 0, datasets: 0, depthLimited: 0, metadata: 0, metadataFailed: 0 };
  reader: CatalogReader;
  q: ConcurrentQueue;
  metadataQ: ConcurrentQueue;
  logger: Logger;
  maxDepth: number;
  delayMs: number;
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
  fetch?: FetchFn;

  constructor(opts: SpiderOptions) {
    this.reader = opts.reader;
    this.maxDepth = opts.maxDepth ?? DefaultMaxDepth;
    this.delayMs = opts.delayMs ?? 0;
    this.retries = opts.retries ?? 3;
    this.retryDelayMs = opts.retryDelayMs ?? 1000;
    this.timeoutMs = opts.timeoutMs ?? DefaultTimeoutMs;
    this.fetch = opts.fetch;
    this.logger = opts.logger ?? defaultLogger;
    this.q = new ConcurrentQueue(opts.catalogConcurrency ?? 5);
    this.metadataQ = new ConcurrentQueue(opts.metadataConcurrency ?? 10);

    this.q.onEmpty(() => {
      this.emit('empty').catch((err: unknown) => {
        this.logger.error({ err: String(err) }, 'spider:empty:error');
      });
    });
    if (opts.signal != null) {
      if (opts.signal.aborted) this.close();
      else opts.signal.addEventListener('abort', () => this.close(), { once: true });
    }
  }

  on<T extends keyof SpiderEvents>(key: T, cb: Listener<T>): void {
    const listeners: { [K in keyof SpiderEvents]?: Listener<K>[] }[T] = this.events[key] ?? [];
    listeners.push(cb);
    this.events[key] = listeners;
  }

  async emit<T extends keyof SpiderEvents>(key: T, ...args: SpiderEvents[T]): Promise<boolean> {
    let ret = true;
    const listeners: Listener<T>[] = this.events[key] ?? [];
    for (const cb of listeners) {
      if ((await cb(...args)) === false) ret = false;
    }
    return ret;
  }

  /** Stop the crawl, queued catalogs and DAS fetches are dropped */
  close(): void {
    this.logger.info({ queued: this.q.size + this.metadataQ.size }, 'spider:close');
    this.q.close();
    this.metadataQ.close();
  }

  /** Crawl from a root catalog, resolves once every reachable catalog within the depth limit was processed */
  async crawl(root: URL): Promise<DatasetRecord[]> {
    this.processUrl({ url: root, depth: 0 });
    await this.q.join();
    this.logger.info({ url: root.href, stats: this.stats }, 'spider:crawl:done');
    return this.datasets;
  }

  /** A catalog reached again at a shallower depth is queued again, so its subtree gets the larger depth budget */
  processUrl(node: CatalogNode): void {
    const url = this.reader.normalizeUrl(node.url);
    const seenDepth = this.seen.get(url.href);
    if (seenDepth != null && seenDepth <= node.depth) return;

    if (node.depth > this.maxDepth) {
      this.stats.depthLimited++;
      this.logger.debug({ url: url.href, depth: node.depth, maxDepth: this.maxDepth }, 'spider:depth:limit');
      return;
    }
    if (seenDepth != null) this.logger.debug({ url: url.href, depth: node.depth, seenDepth }, 'spider:requeue');
    this.seen.set(url.href, node.depth);

    void this.q.push(() => this.processCatalog({ url, depth: node.depth })).catch((err: unknown) => {
      this.stats.failed++;
      this.logger.error({ url: url.href, err: String(err) }, 'spider:catalog:error');
    });
  }

  async processCatalog(node: CatalogNode): Promise<CatalogPage | null> {
    this.logger.debug({ url: node.url.href, depth: node.depth, q: this.q.size }, 'fetch:catalog');

    const res = await request(node.url, { fetch: this.fetch, timeoutMs: this.timeoutMs });
    await sleep(this.delayMs);
    if (!res.ok) {
      this.stats.failed++;
      this.logger.warn({ url: node.url.href, status: res.status, reason: res.reason }, 'fetch:catalog:failed');
      return null;
    }

    let page: CatalogPage;
    try {
      page = this.reader.parse(res.text, node.url);
    } catch (e) {
      this.stats.failed++;
      this.logger.warn({ url: node.url.href, err: String(e) }, 'parse:catalog:failed');
      return null;
    }

    this.stats.catalogs++;
    this.logger.info(
      { url: node.url.href, depth: node.depth, datasets: page.datasets.length, children: page.children.length },
      'fetch:catalog:done',
    );

    for (const ds of page.datasets) {
      if (this.datasetUrls.has(ds.url)) continue;
      this.datasetUrls.add(ds.url);
      this.datasets.push(ds);
      this.stats.datasets++;
      await this.emit('dataset', ds);
    }

    const isAbort = await this.emit('catalog', page, node);
    if (isAbort === false) return page;

    for (const child of page.children) {
      this.logger.trace({ name: child.name, url: child.url.href, depth: node.depth + 1 }, 'spider:queue');
      this.processUrl({ url: child.url, depth: node.depth + 1 });
    }
    return page;
  }

  /**
   * Fetch the DAS attributes of every dataset
   *
   * @returns number of datasets whose DAS was fetched and parsed
   */
  async fetchMetadata(datasets: DatasetRecord[] = this.datasets): Promise<number> {
    let success = 0;
    let done = 0;
    for (const ds of datasets) {
      void this.metadataQ
        .push(async () => {
          const ok = await fetchDasMetadata(ds, {
            fetch: this.fetch,
            retries: this.retries,
            retryDelayMs: this.retryDelayMs,
            timeoutMs: this.timeoutMs,
            logger: this.logger,
          });
          done++;
          if (ok) {
            success++;
            this.stats.metadata++;
          } else {
            this.stats.metadataFailed++;
          }
          this.logger.debug({ id: ds.id, done, total: datasets.length }, 'spider:metadata:progress');
          await this.emit('metadata', ds, ok);
        })
        .catch((err: unknown) => {
          this.logger.error({ id: ds.id, err: String(err) }, 'spider:metadata:error');
        });
    }
    await this.metadataQ.join();
    this.logger.info({ success, total: datasets.length }, 'spider:metadata:done');
    return success;
  }

  async end(): Promise<void> {
    await this.emit('end');
  }
}
