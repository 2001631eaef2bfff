import './cn.fs.js';

import { fsa } from '@chunkd/fs';

import { CliError } from './config.js';
import { type DatasetRecord } from './dataset.js';
import { type DatasetEntry, scanDatasets } from './erddap/config.file.js';
import { createErddapXml, type ErddapXmlOptions } from './erddap/xml.js';
import { logger } from './log.js';
import { type CatalogSpider } from './spider.js';

export async function readText(loc: string): Promise<string> {
  try {
    const buf = await fsa.read(fsa.toUrl(loc));
    return buf.toString('utf-8');
  } catch (e) {
    throw new CliError(`Unable to read ${loc}: ${String(e)}`);
  }
}

export async function writeText(loc: string, text: string): Promise<void> {
  await fsa.write(fsa.toUrl(loc), text);
}

/** Read an ERDDAP configuration file and find its dataset entries */
export async function readConfig(loc: string): Promise<{ text: string; entries: DatasetEntry[] }> {
  const text = await readText(loc);
  try {
    return { text, entries: scanDatasets(text) };
  } catch (e) {
    throw new CliError(`Unable to parse ${loc}: ${String(e)}`);
  }
}

/** Non blank, trimmed lines of a text file */
export async function readLines(loc: string): Promise<string[]> {
  return (await readText(loc))
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l !== '');
}

/**
 * Run an operation to completion
 *
 * Argument and input errors are logged and set a failing exit code, anything else is a bug and is rethrown
 */
export async function run(name: string, op: () => Promise<void>): Promise<void> {
  const startTime = performance.now();
  try {
    await op();
    logger.info({ op: name, duration: Math.round(performance.now() - startTime) }, 'op:done');
  } catch (e) {
    if (e instanceof CliError) {
      logger.fatal({ op: name, err: e.message }, 'op:failed');
      process.exitCode = 1;
      return;
    }
    throw e;
  }
}

export interface CrawlToErddapOptions extends ErddapXmlOptions {
  output: string;
}

/** Crawl from the root catalog, fetch every dataset's DAS then write the ERDDAP configuration */
export async function crawlToErddap(spider: CatalogSpider, root: URL, opts: CrawlToErddapOptions): Promise<DatasetRecord[]> {
  const abort = (): void => spider.close();
  process.once('SIGINT', abort);
  try {
    const crawlStart = performance.now();
    const datasets = await spider.crawl(root);
    logger.info(
      { datasets: datasets.length, duration: Math.round(performance.now() - crawlStart) },
      'crawl:datasets:found',
    );

    const dasStart = performance.now();
    const success = await spider.fetchMetadata(datasets);
    logger.info(
      { success, total: datasets.length, duration: Math.round(performance.now() - dasStart) },
      'crawl:metadata:done',
    );
    await spider.end();

    if (opts.dropEmpty && success === 0) {
      logger.warn({ url: root.href }, 'crawl:metadata:none');
      return datasets;
    }
    const xml = createErddapXml(datasets, opts);
    await writeText(opts.output, xml);
    logger.info({ output: opts.output, datasets: datasets.length }, 'crawl:output:written');
    return datasets;
  } finally {
    process.off('SIGINT', abort);
  }
}
