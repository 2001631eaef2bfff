import { type AttributeMap, attrText, type DatasetRecord, hasMetadata } from '../dataset.js';

export type ErddapDatasetType = 'EDDGridFromDap' | 'EDDGridFromErddap' | 'EDDTableFromErddap';

export const XmlHeader = '<?xml version="1.0" encoding="UTF-8" ?>';

const XmlEntities: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;' };

export function escapeXml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => XmlEntities[ch] ?? ch);
}

function attGroup(name: string, attrs: AttributeMap, indent: string): string[] {
  const lines = [`${indent}<att name="${escapeXml(name)}">`];
  for (const [key, value] of attrs) {
    lines.push(`${indent}  <att name="${escapeXml(key)}">${escapeXml(attrText(value))}</att>`);
  }
  lines.push(`${indent}</att>`);
  return lines;
}

export interface DapDatasetXmlOptions {
  reloadEveryNMinutes?: number;
  active?: boolean;
}

/** `EDDGridFromDap` entry carrying the DAS attributes as `addAttributes` */
export function dapDatasetXml(ds: DatasetRecord, opts: DapDatasetXmlOptions = {}): string {
  const active = opts.active ?? true;
  const lines = [
    `<dataset type="EDDGridFromDap" datasetID="${escapeXml(ds.id)}" active="${active}">`,
    `  <sourceUrl>${escapeXml(ds.url)}</sourceUrl>`,
    `  <reloadEveryNMinutes>${opts.reloadEveryNMinutes ?? 10080}</reloadEveryNMinutes>`,
  ];

  if (hasMetadata(ds)) {
    lines.push('  <addAttributes>');
    if (ds.global.size > 0) lines.push(...attGroup('.', ds.global, '    '));
    for (const [varName, attrs] of ds.variables) {
      if (attrs.size === 0) continue;
      lines.push(...attGroup(varName, attrs, '    '));
    }
    lines.push('  </addAttributes>');
  } else {
    lines.push('  <addAttributes />');
  }

  lines.push('</dataset>');
  return lines.join('\n');
}

export interface RemoteDataset {
  datasetId: string;
  kind: 'grid' | 'table';
  /** ERDDAP base url, eg `https://example.org/erddap` */
  baseUrl: string;
}

/** `EDDGridFromErddap` / `EDDTableFromErddap` entry mirroring a dataset of another ERDDAP server */
export function remoteDatasetXml(ds: RemoteDataset, reloadEveryNMinutes = 180): string {
  const base = ds.baseUrl.replace(/\/+$/, '');
  const type: ErddapDatasetType = ds.kind === 'grid' ? 'EDDGridFromErddap' : 'EDDTableFromErddap';
  const dapPath = ds.kind === 'grid' ? 'griddap' : 'tabledap';
  const id = escapeXml(ds.datasetId);
  return [
    `<dataset type="${type}" datasetID="${id}" active="true">`,
    `  <reloadEveryNMinutes>${reloadEveryNMinutes}</reloadEveryNMinutes>`,
    `  <sourceUrl>${escapeXml(base)}/${dapPath}/${id}</sourceUrl>`,
    '</dataset>',
  ].join('\n');
}

/** Wrap dataset entries into a full `erddapDatasets` document */
export function erddapDocument(entries: string[]): string {
  const body = entries.map((e) =>
    e
      .split('\n')
      .map((line) => '  ' + line)
      .join('\n'),
  );
  return [XmlHeader, '<erddapDatasets>', ...body, '</erddapDatasets>', ''].join('\n');
}

export interface ErddapXmlOptions extends DapDatasetXmlOptions {
  /** Leave out datasets whose DAS gave no attributes */
  dropEmpty?: boolean;
}

export function createErddapXml(datasets: DatasetRecord[], opts: ErddapXmlOptions = {}): string {
  const kept = opts.dropEmpty ? datasets.filter((ds) => hasMetadata(ds)) : datasets;
  return erddapDocument(kept.map((ds) => dapDatasetXml(ds, opts)));
}
