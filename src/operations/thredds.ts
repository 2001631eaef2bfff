/**
 * Crawl a THREDDS catalog and write an ERDDAP `EDDGridFromDap` configuration for every OPeNDAP dataset found
 *
 * ```bash
 * tsx src/operations/thredds.ts --url https://example.org/thredds/catalog.xml --output erddap_datasets.xml --filter
 * ```
 */
import { crawlToErddap, run } from '../bin.js';
import { detectThreddsVersion, ThreddsReader } from '../catalog/thredds.js';
import { parseCli, ThreddsArgs, ThreddsOptions } from '../config.js';
import { logger } from '../log.js';
import { CatalogSpider } from '../spider.js';

await run('thredds', async () => {
  const args = parseCli(ThreddsArgs, ThreddsOptions, process.argv.slice(2));
  const root = new URL(args.url);

  const version =
    args.threddsVersion === 'auto'
      ? await detectThreddsVersion(root, { timeoutMs: args.timeout * 1000 })
      : args.threddsVersion === '5'
        ? 5
        : 4;
  logger.info({ url: root.href, version, maxDepth: args.maxDepth, filter: args.filter }, 'thredds:start');

  const spider = new CatalogSpider({
    reader: new ThreddsReader({ version, filter: args.filter }),
    maxDepth: args.maxDepth,
    catalogConcurrency: args.catalogThreads,
    metadataConcurrency: args.threads,
    delayMs: args.delay * 1000,
    retries: args.retries,
    retryDelayMs: args.retryDelay * 1000,
    timeoutMs: args.timeout * 1000,
  });

  await crawlToErddap(spider, root, { output: args.output, dropEmpty: !args.keepEmpty });
});
