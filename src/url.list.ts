import { z } from 'zod';

import { CliError } from './config.js';
import { extractSourceUrls } from './erddap/config.file.js';
import { type Logger, logger as defaultLogger } from './log.js';

const UrlItem = z.object({ url: z.string().trim().min(1) });
const UrlArray = z.array(z.unknown());

/**
 * Urls of a JSON list of `{ "url": "..." }` objects
 *
 * Items that do not match are logged and skipped, the rest of the list is still used.
 */
export function parseUrlList(json: unknown, log: Logger = defaultLogger): string[] {
  const list = UrlArray.safeParse(json);
  if (!list.success) throw new CliError('Expected a JSON array of { "url": "..." }');

  const urls: string[] = [];
  list.data.forEach((item, index) => {
    const parsed = UrlItem.safeParse(item);
    if (parsed.success) {
      urls.push(parsed.data.url);
      return;
    }
    log.warn({ index, err: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ') }, 'url:list:skip');
  });
  return urls;
}

/**
 * Urls to check from the content of an input file, picked by its extension
 *
 * - `.xml` an ERDDAP configuration, every `sourceUrl`
 * - `.json` a list of `{ "url": "..." }`
 * - anything else one url per line
 */
export function readUrlList(loc: string, text: string, log: Logger = defaultLogger): string[] {
  if (loc.endsWith('.xml')) {
    try {
      return extractSourceUrls(text);
    } catch (e) {
      throw new CliError(`Unable to parse ${loc}: ${String(e)}`);
    }
  }
  if (loc.endsWith('.json')) {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new CliError(`Invalid JSON in ${loc}: ${String(e)}`);
    }
    const urls = parseUrlList(json, log);
    log.debug({ input: loc, urls: urls.length }, 'url:list:parsed');
    return urls;
  }
  return text
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l !== '');
}
