/**
 * List the dataset ids of the second configuration that the first one does not have
 *
 * ```bash
 * tsx src/operations/compare.ts first.xml second.xml --output unique_to_second.txt
 * ```
 */
import { readConfig, run, writeText } from '../bin.js';
import { CompareArgs, CompareOptions, parseCli } from '../config.js';
import { compareIds } from '../erddap/config.file.js';
import { logger } from '../log.js';

await run('compare', async () => {
  const args = parseCli(CompareArgs, CompareOptions, process.argv.slice(2));
  const [first, second] = args.positionals;

  const missing = compareIds((await readConfig(first)).entries, (await readConfig(second)).entries);
  logger.info({ first, second, missing: missing.length }, 'compare:done');
  for (const id of missing) logger.info({ id }, 'compare:missing');

  if (args.output == null || missing.length === 0) return;
  await writeText(args.output, `Datasets in ${second} but not in ${first}:\n\n` + missing.join('\n') + '\n');
  logger.info({ output: args.output }, 'compare:written');
});
