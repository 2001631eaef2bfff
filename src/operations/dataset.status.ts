/**
 * Bulk activate / deactivate datasets of an ERDDAP configuration
 *
 * The list file holds dataset urls or dataset ids, one per line, the dataset id is the last path segment.
 *
 * ```bash
 * tsx src/operations/dataset.status.ts --input datasets.xml --list broken_urls.txt --output updated.xml
 * ```
 */
import { readConfig, readLines, run, writeText } from '../bin.js';
import { parseCli, StatusArgs, StatusOptions } from '../config.js';
import { datasetIdFromUrl, updateStatus } from '../erddap/config.file.js';
import { logger } from '../log.js';

await run('dataset:status', async () => {
  const args = parseCli(StatusArgs, StatusOptions, process.argv.slice(2));

  const ids = new Set((await readLines(args.list)).map(datasetIdFromUrl));
  logger.info({ list: args.list, ids: ids.size, mode: args.mode }, 'status:ids');

  const { text, entries } = await readConfig(args.input);
  const change = updateStatus(text, entries, ids, args.mode);
  for (const id of change.deactivated) logger.debug({ id }, 'status:deactivated');
  for (const id of change.activated) logger.debug({ id }, 'status:activated');

  await writeText(args.output, change.text);
  logger.info(
    { output: args.output, activated: change.activated.length, deactivated: change.deactivated.length },
    'status:written',
  );
});
