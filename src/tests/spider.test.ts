import assert from 'node:assert/strict';
import test from 'node:test';

import { type CatalogPage } from '../catalog/catalog.js';
import { HyraxReader } from '../catalog/hyrax.js';
import { scanDatasets } from '../erddap/config.file.js';
import { createErddapXml } from '../erddap/xml.js';
import { sleep } from '../http.js';
import { CatalogSpider } from '../spider.js';
import { captureLogger, fakeServer, type FakeRoute, silentLogger } from './fake.fetch.js';

const Root = new URL('https://example.org/data/');

/** Three levels deep, `l1/` links back to the root */
const Tree = {
  'https://example.org/data/': '<a href="../">up</a><a href="a.nc">a</a><a href="l1/">l1</a>',
  'https://example.org/data/l1/': '<a href="/data/">root</a><a href="b.nc">b</a><a href="l2/">l2</a>',
  'https://example.org/data/l1/l2/': '<a href="c.nc">c</a>',
};

function spider(fetch: ReturnType<typeof fakeServer>['fetch'], maxDepth: number, signal?: AbortSignal): CatalogSpider {
  return new CatalogSpider({
    reader: new HyraxReader({ logger: silentLogger }),
    maxDepth,
    retries: 2,
    retryDelayMs: 0,
    fetch,
    logger: silentLogger,
    signal,
  });
}

test('depth limit drops the deepest level only', async () => {
  const server = fakeServer(Tree);
  const s = spider(server.fetch, 1);
  const datasets = await s.crawl(Root);

  assert.deepEqual(datasets.map((d) => d.name).sort(), ['a.nc', 'b.nc']);
  assert.equal(s.stats.depthLimited, 1);
  assert.equal(s.stats.catalogs, 2);
  assert.equal(server.count('https://example.org/data/l1/l2/'), 0);
});

test('crawls every level within the depth limit, each catalog once', async () => {
  const server = fakeServer(Tree);
  const s = spider(server.fetch, 5);
  const datasets = await s.crawl(Root);

  assert.deepEqual(datasets.map((d) => d.name).sort(), ['a.nc', 'b.nc', 'c.nc']);
  assert.equal(server.count('https://example.org/data/'), 1);
  assert.equal(s.stats.catalogs, 3);
  assert.equal(s.stats.datasets, 3);
  assert.equal(s.stats.depthLimited, 0);
});

test('a max depth of 0 only reads the root catalog', async () => {
  const server = fakeServer(Tree);
  const datasets = await spider(server.fetch, 0).crawl(Root);
  assert.deepEqual(
    datasets.map((d) => d.name),
    ['a.nc'],
  );
  assert.deepEqual(server.requests, ['GET https://example.org/data/']);
});

test('a failing catalog does not stop the crawl', async () => {
  const server = fakeServer({ ...Tree, 'https://example.org/data/l1/': 500 });
  const s = spider(server.fetch, 5);
  const datasets = await s.crawl(Root);

  assert.deepEqual(
    datasets.map((d) => d.name),
    ['a.nc'],
  );
  assert.equal(s.stats.failed, 1);
  // Catalog fetches are not retried
  assert.equal(server.count('https://example.org/data/l1/'), 1);
});

test('a catalog listener can stop the spider descending', async () => {
  const server = fakeServer(Tree);
  const s = spider(server.fetch, 5);
  const depths: number[] = [];
  s.on('catalog', async (_page, node) => {
    depths.push(node.depth);
    return false;
  });
  const datasets = await s.crawl(Root);

  assert.deepEqual(depths, [0]);
  assert.deepEqual(
    datasets.map((d) => d.name),
    ['a.nc'],
  );
});

test('an aborted crawl fetches nothing', async () => {
  const server = fakeServer(Tree);
  const ac = new AbortController();
  ac.abort();
  const datasets = await spider(server.fetch, 5, ac.signal).crawl(Root);

  assert.equal(datasets.length, 0);
  assert.equal(server.requests.length, 0);
});

const MetadataTree = {
  'https://example.org/data/': '<a href="a.nc">a</a><a href="b.nc">b</a>',
  'https://example.org/data/a.nc.das': 'Attributes { String title "A"; }',
  'https://example.org/data/b.nc.das': 500,
};

async function crawlWithMetadata(dropEmpty: boolean): Promise<{ ids: string[]; success: number; dasCalls: number }> {
  const server = fakeServer(MetadataTree);
  const s = spider(server.fetch, 0);
  const datasets = await s.crawl(Root);
  const success = await s.fetchMetadata(datasets);

  const xml = createErddapXml(datasets, { dropEmpty });
  return {
    ids: scanDatasets(xml).map((e) => e.datasetId),
    success,
    dasCalls: server.count('https://example.org/data/b.nc.das'),
  };
}

test('a failed DAS keeps the dataset unless empty datasets are dropped', async () => {
  assert.deepEqual(await crawlWithMetadata(false), { ids: ['a_nc', 'b_nc'], success: 1, dasCalls: 2 });
  assert.deepEqual(await crawlWithMetadata(true), { ids: ['a_nc'], success: 1, dasCalls: 2 });
  // Same fault, same outcome
  assert.deepEqual(await crawlWithMetadata(true), { ids: ['a_nc'], success: 1, dasCalls: 2 });
});

test('metadata events report every dataset', async () => {
  const server = fakeServer(MetadataTree);
  const s = spider(server.fetch, 0);
  const seen: [string, boolean][] = [];
  s.on('metadata', async (ds, ok) => {
    seen.push([ds.id, ok]);
  });
  await s.fetchMetadata(await s.crawl(Root));

  assert.deepEqual(
    seen.sort((a, b) => a[0].localeCompare(b[0])),
    [
      ['a_nc', true],
      ['b_nc', false],
    ],
  );
  assert.equal(s.stats.metadata, 1);
  assert.equal(s.stats.metadataFailed, 1);
});

test('catalog fetches never exceed the catalog concurrency', async () => {
  const routes: Record<string, FakeRoute> = {};
  const links: string[] = [];
  for (let i = 0; i < 6; i++) {
    links.push(`<a href="d${i}/">d${i}</a>`);
    routes[`https://example.org/data/d${i}/`] = async () => {
      await sleep(10);
      return `<a href="f${i}.nc">f${i}</a>`;
    };
  }
  routes['https://example.org/data/'] = links.join('');
  const server = fakeServer(routes);

  const s = new CatalogSpider({
    reader: new HyraxReader({ logger: silentLogger }),
    catalogConcurrency: 2,
    fetch: server.fetch,
    logger: silentLogger,
  });
  const datasets = await s.crawl(Root);

  assert.equal(datasets.length, 6);
  assert.equal(server.requests.length, 7);
  assert.equal(server.maxInFlight(), 2);
});

test('the spider pauses after every catalog fetch', async () => {
  const server = fakeServer(Tree);
  const s = new CatalogSpider({
    reader: new HyraxReader({ logger: silentLogger }),
    delayMs: 40,
    fetch: server.fetch,
    logger: silentLogger,
  });
  const startTime = performance.now();
  await s.crawl(Root);
  const duration = performance.now() - startTime;

  assert.equal(server.times.length, 3);
  assert.ok(server.times[1] - server.times[0] >= 35, `l1 fetched ${server.times[1] - server.times[0]}ms after root`);
  assert.ok(server.times[2] - server.times[1] >= 35, `l2 fetched ${server.times[2] - server.times[1]}ms after l1`);
  // The last catalog is followed by a pause as well
  assert.ok(duration >= 110, `crawl took ${duration}ms`);
});

class FailingReader extends HyraxReader {
  override parse(html: string, url: URL): CatalogPage {
    if (url.pathname === '/data/bad/') throw new Error('Unexpected listing');
    return super.parse(html, url);
  }
}

test('a catalog that cannot be parsed is logged and skipped', async () => {
  const server = fakeServer({
    'https://example.org/data/': '<a href="bad/">bad</a><a href="good/">good</a><a href="a.nc">a</a>',
    'https://example.org/data/bad/': '<a href="x.nc">x</a>',
    'https://example.org/data/good/': '<a href="g.nc">g</a>',
  });
  const log = captureLogger();
  const s = new CatalogSpider({ reader: new FailingReader({ logger: silentLogger }), fetch: server.fetch, logger: log.logger });
  const datasets = await s.crawl(Root);

  assert.deepEqual(datasets.map((d) => d.name).sort(), ['a.nc', 'g.nc']);
  assert.equal(s.stats.failed, 1);
  assert.equal(s.stats.catalogs, 2);
  assert.deepEqual(
    log.lines.filter((l) => l['msg'] === 'parse:catalog:failed').map((l) => [l['level'], l['url'], l['err']]),
    [[40, 'https://example.org/data/bad/', 'Error: Unexpected listing']],
  );
});

test('a failing empty listener is logged', async () => {
  const server = fakeServer({ 'https://example.org/data/': '<a href="a.nc">a</a>' });
  const log = captureLogger();
  const s = new CatalogSpider({ reader: new HyraxReader({ logger: silentLogger }), fetch: server.fetch, logger: log.logger });
  s.on('empty', async () => {
    throw new Error('listener failed');
  });
  const datasets = await s.crawl(Root);
  await new Promise((resolve) => setImmediate(resolve));

  assert.equal(datasets.length, 1);
  assert.deepEqual(
    log.lines.filter((l) => l['msg'] === 'spider:empty:error').map((l) => [l['level'], l['err']]),
    [[50, 'Error: listener failed']],
  );
});

test('a catalog reached again closer to the root is crawled again', async () => {
  const server = fakeServer({
    'https://example.org/data/': '<a href="a/">a</a><a href="b/">b</a>',
    'https://example.org/data/a/': '<a href="deep/">deep</a>',
    'https://example.org/data/a/deep/': '<a href="/data/shared/">shared</a>',
    // Slow enough for the deeper path to reach shared/ first
    'https://example.org/data/b/': async () => {
      await sleep(100);
      return '<a href="/data/shared/">shared</a>';
    },
    'https://example.org/data/shared/': '<a href="s.nc">s</a><a href="leaf/">leaf</a>',
    'https://example.org/data/shared/leaf/': '<a href="l.nc">l</a>',
  });
  const s = spider(server.fetch, 3);
  const datasets = await s.crawl(Root);

  assert.deepEqual(datasets.map((d) => d.name).sort(), ['l.nc', 's.nc']);
  assert.equal(server.count('https://example.org/data/shared/'), 2);
  assert.equal(server.count('https://example.org/data/shared/leaf/'), 1);
  assert.equal(s.stats.depthLimited, 1);
  assert.equal(s.stats.datasets, 2);
  assert.equal(s.seen.get('https://example.org/data/shared/'), 2);
});
