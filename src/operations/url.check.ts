/**
 * Check that the datasets of an ERDDAP configuration (or a plain list of urls) are reachable
 *
 * Grid datasets are checked through `.das`, table datasets through `.nccsvMetadata`, results are written as csv.
 *
 * ```bash
 * tsx src/operations/url.check.ts --input datasets.xml --output url_test_results.csv --threads 20
 * ```
 */
import { availabilityCsv, checkUrls } from '../availability.js';
import { readText, run, writeText } from '../bin.js';
import { parseCli, UrlCheckArgs, UrlCheckOptions } from '../config.js';
import { logger } from '../log.js';
import { readUrlList } from '../url.list.js';

await run('url:check', async () => {
  const args = parseCli(UrlCheckArgs, UrlCheckOptions, process.argv.slice(2));

  const urls = readUrlList(args.input, await readText(args.input));
  logger.info({ input: args.input, urls: urls.length }, 'url:check:start');

  const results = await checkUrls(urls, {
    concurrency: args.threads,
    attempts: args.retries,
    retryDelayMs: args.retryDelay * 1000,
    timeoutMs: args.timeout * 1000,
  });

  await writeText(args.output, availabilityCsv(results));
  const ok = results.filter((r) => r.ok).length;
  logger.info({ output: args.output, ok, failed: results.length - ok }, 'url:check:done');
});
