import sax, { type QualifiedTag, type SAXParser, type Tag } from 'sax';

import { escapeXml } from './xml.js';

/** Offsets into the document text, `end` is exclusive */
export interface TextSpan {
  start: number;
  end: number;
}

/** A replacement of the text covered by the span */
export interface TextEdit extends TextSpan {
  text: string;
}

/**
 * A `<dataset>` element directly below the document root of an ERDDAP configuration
 *
 * Datasets nested inside another dataset (the children of an aggregation) belong to their parent entry.
 * Offsets are kept so the file can be rewritten without touching its formatting or comments.
 */
export interface DatasetEntry {
  datasetId: string;
  type: string | null;
  active: boolean | null;
  /** The entry's own `sourceUrl`, never one of a nested dataset */
  sourceUrl: string | null;
  /** 1-based line of the opening `<dataset` tag */
  startLine: number;
  /** 1-based line of the closing `</dataset>` */
  endLine: number;
  /** From `<dataset` to the end of `</dataset>` */
  span: TextSpan;
  /** The opening tag */
  tag: TextSpan;
  /** Raw content of the entry's own `sourceUrl` element */
  sourceUrlSpan: TextSpan | null;
}

function createParser(): SAXParser {
  const parser = sax.parser(true, { position: true });
  parser.onerror = (err) => {
    throw new Error(`XML parsing error: ${err.message}`);
  };
  return parser;
}

function attrValue(node: Tag | QualifiedTag, name: string): string | null {
  const value = node.attributes[name];
  if (value == null) return null;
  return typeof value === 'string' ? value : value.value;
}

function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) if (text[i] === '\n') starts.push(i + 1);
  return starts;
}

/** 1-based line holding the character at `offset` */
function lineAt(starts: number[], offset: number): number {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (starts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

/**
 * Find the dataset entries of a configuration document
 *
 * @throws {Error} when the document is not well formed XML
 */
export function scanDatasets(text: string): DatasetEntry[] {
  const parser = createParser();
  const starts = lineStarts(text);
  const entries: DatasetEntry[] = [];
  let depth = 0;
  let current: DatasetEntry | null = null;
  let urlStart = -1;
  let urlText = '';

  parser.onopentag = (node): void => {
    depth++;
    if (depth === 2 && node.name === 'dataset') {
      const datasetId = attrValue(node, 'datasetID');
      if (datasetId == null) return;
      const start = parser.startTagPosition - 1;
      const active = attrValue(node, 'active');
      current = {
        datasetId,
        type: attrValue(node, 'type'),
        active: active == null ? null : active === 'true',
        sourceUrl: null,
        startLine: lineAt(starts, start),
        endLine: lineAt(starts, start),
        span: { start, end: parser.position },
        tag: { start, end: parser.position },
        sourceUrlSpan: null,
      };
    } else if (depth === 3 && current != null && node.name === 'sourceUrl') {
      urlStart = parser.position;
      urlText = '';
    }
  };
  parser.ontext = (t): void => {
    urlText += t;
  };
  parser.onclosetag = (name): void => {
    if (current != null) {
      if (depth === 3 && name === 'sourceUrl' && urlStart !== -1) {
        current.sourceUrl = urlText.trim();
        current.sourceUrlSpan = { start: urlStart, end: parser.startTagPosition - 1 };
        urlStart = -1;
      } else if (depth === 2) {
        current.span.end = parser.position;
        current.endLine = lineAt(starts, parser.position - 1);
        entries.push(current);
        current = null;
      }
    }
    depth--;
  };

  parser.write(text).close();
  return entries;
}

export interface SourceUrlRef {
  url: string;
  span: TextSpan;
}

/** Every `sourceUrl` element of the document, nested datasets included, in order */
export function scanSourceUrls(text: string): SourceUrlRef[] {
  const parser = createParser();
  const refs: SourceUrlRef[] = [];
  let urlStart = -1;
  let urlText = '';

  parser.onopentag = (node): void => {
    if (node.name !== 'sourceUrl') return;
    urlStart = parser.position;
    urlText = '';
  };
  parser.ontext = (t): void => {
    urlText += t;
  };
  parser.onclosetag = (name): void => {
    if (name !== 'sourceUrl' || urlStart === -1) return;
    refs.push({ url: urlText.trim(), span: { start: urlStart, end: parser.startTagPosition - 1 } });
    urlStart = -1;
  };

  parser.write(text).close();
  return refs;
}

export function extractSourceUrls(text: string): string[] {
  return scanSourceUrls(text).map((ref) => ref.url);
}

/** Apply non overlapping edits, offsets refer to the original text */
export function spliceText(text: string, edits: TextEdit[]): string {
  let out = text;
  for (const edit of [...edits].sort((a, b) => b.start - a.start)) {
    out = out.slice(0, edit.start) + edit.text + out.slice(edit.end);
  }
  return out;
}

/** Replace the value of an attribute that is already present on an opening tag */
export function setTagAttr(tag: string, name: string, value: string): string {
  const re = new RegExp(`(\\s${name}\\s*=\\s*)("[^"]*"|'[^']*')`);
  return tag.replace(re, (_match, prefix: string) => `${prefix}"${escapeXml(value)}"`);
}

export interface Duplicates {
  ids: Map<string, DatasetEntry[]>;
  urls: Map<string, DatasetEntry[]>;
}

function groupBy(entries: DatasetEntry[], key: (e: DatasetEntry) => string | null): Map<string, DatasetEntry[]> {
  const groups = new Map<string, DatasetEntry[]>();
  for (const entry of entries) {
    const k = key(entry);
    if (k == null) continue;
    const list = groups.get(k) ?? [];
    list.push(entry);
    groups.set(k, list);
  }
  for (const [k, list] of groups) if (list.length < 2) groups.delete(k);
  return groups;
}

/** Dataset ids and source urls that appear more than once */
export function findDuplicates(entries: DatasetEntry[]): Duplicates {
  return { ids: groupBy(entries, (e) => e.datasetId), urls: groupBy(entries, (e) => e.sourceUrl) };
}

export function formatDuplicateReport(dups: Duplicates): string {
  const out: string[] = [];
  for (const [id, list] of dups.ids) {
    out.push(`DatasetID: ${id}`, `Appears ${list.length} times:`);
    for (const e of list) out.push(`  Line ${e.startLine}: ${e.sourceUrl ?? 'unknown'}`);
    out.push('');
  }
  for (const [url, list] of dups.urls) {
    out.push(`SourceURL: ${url}`, `Appears ${list.length} times:`);
    for (const e of list) out.push(`  Line ${e.startLine}: ${e.datasetId}`);
    out.push('');
  }
  return out.join('\n');
}

/** Widen a span to its whole lines when nothing else shares them */
function blockSpan(text: string, span: TextSpan): TextSpan {
  let start = span.start;
  while (start > 0 && (text[start - 1] === ' ' || text[start - 1] === '\t')) start--;
  let end = span.end;
  while (end < text.length && (text[end] === ' ' || text[end] === '\t' || text[end] === '\r')) end++;

  const ownLines = (start === 0 || text[start - 1] === '\n') && (end === text.length || text[end] === '\n');
  if (!ownLines) return span;
  return { start, end: end < text.length ? end + 1 : end };
}

export type KeepPolicy = 'first' | 'last';

/**
 * Remove all but one `<dataset>` element of every duplicated dataset id
 *
 * @returns the new document and the entries that were removed
 */
export function removeDuplicates(
  text: string,
  entries: DatasetEntry[],
  keep: KeepPolicy = 'first',
): { text: string; removed: DatasetEntry[] } {
  const { ids } = findDuplicates(entries);
  const removed: DatasetEntry[] = [];
  for (const list of ids.values()) {
    const kept = keep === 'first' ? list[0] : list[list.length - 1];
    for (const e of list) if (e !== kept) removed.push(e);
  }
  removed.sort((a, b) => a.span.start - b.span.start);

  const edits = removed.map((e): TextEdit => ({ ...blockSpan(text, e.span), text: '' }));
  return { text: spliceText(text, edits), removed };
}

/** Dataset id from an ERDDAP dataset url, its last path segment */
export function datasetIdFromUrl(url: string): string {
  const parts = url.trim().replace(/\/+$/, '').split('/');
  return parts[parts.length - 1] ?? '';
}

/**
 * - `toggle`: listed datasets are deactivated, unlisted inactive datasets are activated
 * - `deactivate`: only listed active datasets change
 */
export type StatusMode = 'toggle' | 'deactivate';

export interface StatusChange {
  text: string;
  activated: string[];
  deactivated: string[];
}

/** Flip the `active` attribute of dataset entries, entries without one are left alone */
export function updateStatus(text: string, entries: DatasetEntry[], ids: Set<string>, mode: StatusMode): StatusChange {
  const activated: string[] = [];
  const deactivated: string[] = [];
  const edits: TextEdit[] = [];

  for (const e of entries) {
    if (e.active == null) continue;
    const listed = ids.has(e.datasetId);
    let next: boolean | null = null;
    if (e.active && listed) {
      next = false;
      deactivated.push(e.datasetId);
    } else if (mode === 'toggle' && !e.active && !listed) {
      next = true;
      activated.push(e.datasetId);
    }
    if (next == null) continue;
    edits.push({ ...e.tag, text: setTagAttr(text.slice(e.tag.start, e.tag.end), 'active', String(next)) });
  }

  return { text: spliceText(text, edits), activated, deactivated };
}

/** Dataset ids present in `second` but missing from `first`, sorted */
export function compareIds(first: DatasetEntry[], second: DatasetEntry[]): string[] {
  const known = new Set(first.map((e) => e.datasetId));
  const missing = new Set<string>();
  for (const e of second) if (!known.has(e.datasetId)) missing.add(e.datasetId);
  return [...missing].sort();
}
