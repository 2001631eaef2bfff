/**
 * Rewrite an ERDDAP configuration to read its datasets through a mirror ERDDAP
 *
 * `--mode erddap` turns OPeNDAP grids into `EDDGridFromErddap` entries on the mirror and moves ERDDAP to ERDDAP
 * entries onto `--host`, `--mode rehost` only moves every ERDDAP source url onto `--host`.
 *
 * ```bash
 * tsx src/operations/mirror.ts --input datasets.xml --output mirrored.xml --mirror https://mirror.example.org/erddap
 * ```
 */
import { readConfig, run, writeText } from '../bin.js';
import { MirrorArgs, MirrorOptions, parseCli } from '../config.js';
import { mirrorDatasets, rehostSourceUrls } from '../erddap/mirror.js';
import { logger } from '../log.js';

await run('mirror', async () => {
  const args = parseCli(MirrorArgs, MirrorOptions, process.argv.slice(2));
  const origin = args.host ?? new URL(args.mirror).origin;

  const { text, entries } = await readConfig(args.input);
  logger.info({ input: args.input, datasets: entries.length, mode: args.mode, origin }, 'mirror:start');

  if (args.mode === 'rehost') {
    const res = rehostSourceUrls(text, origin);
    await writeText(args.output, res.text);
    logger.info({ output: args.output, changed: res.changed }, 'mirror:written');
    return;
  }

  const res = mirrorDatasets(text, entries, { mirror: args.mirror, origin });
  for (const id of res.converted) logger.debug({ id }, 'mirror:converted');
  for (const id of res.repointed) logger.debug({ id }, 'mirror:repointed');
  await writeText(args.output, res.text);
  logger.info(
    { output: args.output, converted: res.converted.length, repointed: res.repointed.length },
    'mirror:written',
  );
});
