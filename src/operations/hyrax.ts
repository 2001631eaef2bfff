/**
 * Crawl a Hyrax directory tree and write an ERDDAP `EDDGridFromDap` configuration for every dataset file found
 *
 * ```bash
 * tsx src/operations/hyrax.ts --url https://example.org/opendap/ --extensions .nc,.h5 --delay 0.5
 * ```
 */
import { crawlToErddap, run } from '../bin.js';
import { detectExtensions, HyraxReader } from '../catalog/hyrax.js';
import { HyraxArgs, HyraxOptions, parseCli } from '../config.js';
import { request } from '../http.js';
import { logger } from '../log.js';
import { CatalogSpider } from '../spider.js';

async function resolveExtensions(root: URL, setting: string, timeoutMs: number): Promise<string[]> {
  if (setting !== 'auto') {
    return setting
      .split(',')
      .map((ext) => ext.trim())
      .filter((ext) => ext !== '')
      .map((ext) => (ext.startsWith('.') ? ext : '.' + ext));
  }
  const page = await request(root, { timeoutMs });
  if (!page.ok) {
    logger.warn({ url: root.href, reason: page.reason }, 'hyrax:extensions:fallback');
    return detectExtensions('');
  }
  return detectExtensions(page.text);
}

await run('hyrax', async () => {
  const args = parseCli(HyraxArgs, HyraxOptions, process.argv.slice(2));
  const root = new URL(args.url);

  const extensions = await resolveExtensions(root, args.extensions, args.timeout * 1000);
  logger.info({ url: root.href, extensions, maxDepth: args.maxDepth }, 'hyrax:start');

  const spider = new CatalogSpider({
    reader: new HyraxReader({ extensions, filter: args.filter }),
    maxDepth: args.maxDepth,
    catalogConcurrency: args.catalogThreads,
    metadataConcurrency: args.threads,
    delayMs: args.delay * 1000,
    retries: args.retries,
    retryDelayMs: args.retryDelay * 1000,
    timeoutMs: args.timeout * 1000,
  });

  await crawlToErddap(spider, root, { output: args.output, dropEmpty: args.dropEmpty });
});
