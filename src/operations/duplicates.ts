/**
 * Report duplicate dataset ids and source urls of an ERDDAP configuration, optionally writing a copy without them
 *
 * ```bash
 * tsx src/operations/duplicates.ts --input datasets.xml --report duplicates.txt --output cleaned.xml --keep first
 * ```
 */
import { readConfig, run, writeText } from '../bin.js';
import { DuplicatesArgs, DuplicatesOptions, parseCli } from '../config.js';
import { findDuplicates, formatDuplicateReport, removeDuplicates } from '../erddap/config.file.js';
import { logger } from '../log.js';

await run('duplicates', async () => {
  const args = parseCli(DuplicatesArgs, DuplicatesOptions, process.argv.slice(2));

  const { text, entries } = await readConfig(args.input);
  if (entries.length === 0) logger.warn({ input: args.input }, 'duplicates:no:datasets');

  const dups = findDuplicates(entries);
  logger.info({ datasets: entries.length, ids: dups.ids.size, urls: dups.urls.size }, 'duplicates:found');
  for (const [id, list] of dups.ids) {
    logger.info({ id, lines: list.map((e) => e.startLine) }, 'duplicates:id');
  }
  for (const [url, list] of dups.urls) {
    logger.info({ url, lines: list.map((e) => e.startLine) }, 'duplicates:url');
  }

  if (dups.ids.size > 0 || dups.urls.size > 0) {
    await writeText(args.report, formatDuplicateReport(dups));
    logger.info({ report: args.report }, 'duplicates:report:written');
  }

  if (args.output == null) return;
  const cleaned = removeDuplicates(text, entries, args.keep);
  await writeText(args.output, cleaned.text);
  logger.info(
    { output: args.output, removed: cleaned.removed.length, remaining: entries.length - cleaned.removed.length },
    'duplicates:output:written',
  );
});
