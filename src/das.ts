import { type AttributeMap, type AttrValue, type DatasetRecord } from './dataset.js';
import { type FetchFn, requestWithRetry } from './http.js';
import { type Logger, logger as defaultLogger } from './log.js';

export const FloatTypes = new Set(['Float32', 'Float64']);
export const IntTypes = new Set(['Byte', 'Int8', 'Int16', 'Int32', 'Int64', 'UInt8', 'UInt16', 'UInt32', 'UInt64']);

export interface DasAttributes {
  global: AttributeMap;
  variables: Map<string, AttributeMap>;
}

const AttributeLine = /^(\w+)\s+(\w+)\s+(.+);/;
const SectionHeader = /^([\w.-]+)\s*\{$/;

/**
 * Split DAS text into statements: `name {`, `}` and `type name value;`
 *
 * Braces and semicolons inside quoted strings do not end a statement, so both the usual one attribute per line
 * layout and a DAS squashed onto a single line are read the same way.
 */
export function splitDasStatements(text: string): string[] {
  const out: string[] = [];
  let current = '';
  let inQuote = false;

  const flush = (): void => {
    const stmt = current.trim();
    if (stmt !== '') out.push(stmt);
    current = '';
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuote) {
      current += ch;
      if (ch === '\\' && i + 1 < text.length) {
        current += text[++i];
      } else if (ch === '"') {
        inQuote = false;
      }
      continue;
    }

    if (ch === '"') {
      inQuote = true;
      current += ch;
    } else if (ch === ';' || ch === '{') {
      current += ch;
      flush();
    } else if (ch === '}') {
      flush();
      out.push('}');
    } else if (ch === '\n' || ch === '\r') {
      // A line break ends a statement missing its terminator, the attribute pattern then rejects it
      flush();
    } else {
      current += ch;
    }
  }
  flush();
  return out;
}

function parseFloatText(raw: string): number | null {
  if (/^[+-]?(nan)$/i.test(raw)) return NaN;
  if (/^\+?inf(inity)?$/i.test(raw)) return Infinity;
  if (/^-inf(inity)?$/i.test(raw)) return -Infinity;
  if (/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(raw)) return Number(raw);
  return null;
}

function parseIntText(raw: string): number | null {
  if (/^[+-]?\d+$/.test(raw)) return Number(raw);
  return null;
}

/** Parse a single `type name value;` statement, `null` if the statement is not an attribute */
export function parseDasAttribute(line: string): { name: string; value: AttrValue } | null {
  const match = AttributeLine.exec(line.trim());
  if (match == null) return null;
  const [, attrType, name, valueText] = match;
  const raw = valueText.trim();

  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
    const value = raw.slice(1, -1).replace(/\\(["\\])/g, '$1');
    return { name, value: { type: 'string', value } };
  }

  if (FloatTypes.has(attrType)) {
    const value = parseFloatText(raw);
    if (value != null) return { name, value: { type: 'float', value, raw } };
  } else if (IntTypes.has(attrType)) {
    const value = parseIntText(raw);
    if (value != null) return { name, value: { type: 'int', value, raw } };
  }
  return { name, value: { type: 'string', value: raw } };
}

/**
 * Parse a DAS document into global and per variable attributes
 *
 * Unparseable statements are skipped with a warning, DAS layout varies between server implementations.
 *
 * @example
 * ```typescript
 * const das = parseDas('Attributes { String title "SST"; } sst { Float32 _FillValue -999.0; }');
 * das.global.get('title'); // { type: 'string', value: 'SST' }
 * das.variables.get('sst')?.get('_FillValue'); // { type: 'float', value: -999, raw: '-999.0' }
 * ```
 */
export function parseDas(text: string, log: Logger = defaultLogger): DasAttributes {
  const global: AttributeMap = new Map();
  const variables = new Map<string, AttributeMap>();
  // Innermost section last, `null` marks the global section
  const sections: (string | null)[] = [];

  for (const stmt of splitDasStatements(text)) {
    const header = SectionHeader.exec(stmt);
    if (header != null) {
      const varName = header[1];
      if (varName === 'Attributes') {
        sections.push(null);
        continue;
      }
      if (!variables.has(varName)) variables.set(varName, new Map());
      sections.push(varName);
      continue;
    }

    if (stmt === '}') {
      sections.pop();
      continue;
    }

    const attr = parseDasAttribute(stmt);
    if (attr == null) {
      log.warn({ line: stmt }, 'das:skip:unparseable');
      continue;
    }

    const current = sections.at(-1);
    if (current === undefined) {
      log.warn({ line: stmt }, 'das:skip:outside');
      continue;
    }
    const target = current === null ? global : variables.get(current);
    target?.set(attr.name, attr.value);
  }

  return { global, variables };
}

export interface DasFetchOptions {
  fetch?: FetchFn;
  /** Attempts per dataset, every failure kind is retried */
  retries: number;
  retryDelayMs: number;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Fetch `<url>.das` and store the parsed attributes on the dataset
 *
 * A failed fetch leaves the attributes empty and marks the dataset as failed, it never throws
 */
export async function fetchDasMetadata(ds: DatasetRecord, opts: DasFetchOptions): Promise<boolean> {
  const log = opts.logger ?? defaultLogger;
  const dasUrl = new URL(ds.url + '.das');
  log.trace({ id: ds.id, url: dasUrl.href }, 'fetch:das');

  const res = await requestWithRetry(dasUrl, {
    fetch: opts.fetch,
    attempts: opts.retries,
    delayMs: opts.retryDelayMs,
    timeoutMs: opts.timeoutMs,
    logger: log,
  });

  if (!res.ok) {
    ds.metadata = 'failed';
    log.warn({ id: ds.id, url: dasUrl.href, attempts: res.attempts, reason: res.reason }, 'das:failed');
    return false;
  }

  const das = parseDas(res.text, log);
  ds.global = das.global;
  ds.variables = das.variables;
  ds.metadata = 'ok';
  log.trace({ id: ds.id, global: das.global.size, variables: das.variables.size }, 'fetch:das:done');
  return true;
}
