/**
 * Mirror every dataset of a remote ERDDAP server as `EDDGridFromErddap` / `EDDTableFromErddap` entries
 *
 * ```bash
 * tsx src/operations/erddap.remote.ts --url https://example.org/erddap --reload 1440
 * ```
 */
import { CliError, parseCli, RemoteArgs, RemoteOptions } from '../config.js';
import { listRemoteDatasets } from '../erddap/remote.js';
import { erddapDocument, remoteDatasetXml } from '../erddap/xml.js';
import { run, writeText } from '../bin.js';
import { logger } from '../log.js';

await run('erddap:remote', async () => {
  const args = parseCli(RemoteArgs, RemoteOptions, process.argv.slice(2));

  const res = await listRemoteDatasets(args.url, { timeoutMs: args.timeout * 1000 });
  if (!res.ok) throw new CliError(`Failed to list datasets of ${args.url}: ${res.reason}`);

  const xml = erddapDocument(res.datasets.map((ds) => remoteDatasetXml(ds, args.reload)));
  await writeText(args.output, xml);
  logger.info({ output: args.output, datasets: res.datasets.length }, 'erddap:remote:written');
});
