import { z } from 'zod';

import { type FetchFn, request } from '../http.js';
import { type Logger, logger as defaultLogger } from '../log.js';
import { type RemoteDataset } from './xml.js';

/** ERDDAP `.json` table response */
export const ErddapTable = z.object({
  table: z.object({
    columnNames: z.array(z.string()),
    rows: z.array(z.array(z.union([z.string(), z.number(), z.boolean(), z.null()]))),
  }),
});
export type ErddapTable = z.infer<typeof ErddapTable>;

export type RemoteListResult = { ok: true; datasets: RemoteDataset[] } | { ok: false; reason: string };

export function allDatasetsUrl(baseUrl: string): URL {
  const base = baseUrl.replace(/\/+$/, '');
  return new URL(`${base}/tabledap/allDatasets.json?datasetID,dataStructure`);
}

/** Turn the `allDatasets` table into dataset entries, the `allDatasets` pseudo dataset itself is skipped */
export function parseAllDatasets(table: ErddapTable, baseUrl: string): RemoteDataset[] {
  const cols = table.table.columnNames;
  const idCol = cols.indexOf('datasetID');
  const structureCol = cols.indexOf('dataStructure');
  if (idCol === -1) return [];

  const out: RemoteDataset[] = [];
  for (const row of table.table.rows) {
    const id = row[idCol];
    if (typeof id !== 'string' || id === '' || id === 'allDatasets') continue;
    const structure = structureCol === -1 ? null : row[structureCol];
    out.push({
      datasetId: id,
      kind: String(structure ?? '').toLowerCase() === 'grid' ? 'grid' : 'table',
      baseUrl: baseUrl.replace(/\/+$/, ''),
    });
  }
  return out;
}

export interface RemoteListOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
  logger?: Logger;
}

export async function listRemoteDatasets(baseUrl: string, opts: RemoteListOptions = {}): Promise<RemoteListResult> {
  const log = opts.logger ?? defaultLogger;
  const url = allDatasetsUrl(baseUrl);
  log.info({ url: url.href }, 'fetch:allDatasets');

  const res = await request(url, { fetch: opts.fetch, timeoutMs: opts.timeoutMs });
  if (!res.ok) return { ok: false, reason: res.reason };

  let json: unknown;
  try {
    json = JSON.parse(res.text);
  } catch (e) {
    return { ok: false, reason: 'Invalid JSON: ' + String(e) };
  }
  const parsed = ErddapTable.safeParse(json);
  if (!parsed.success) return { ok: false, reason: 'Unexpected response: ' + parsed.error.message };

  const datasets = parseAllDatasets(parsed.data, baseUrl);
  log.info(
    {
      total: datasets.length,
      grids: datasets.filter((d) => d.kind === 'grid').length,
      tables: datasets.filter((d) => d.kind === 'table').length,
    },
    'fetch:allDatasets:done',
  );
  return { ok: true, datasets };
}
