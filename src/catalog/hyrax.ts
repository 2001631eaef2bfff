import { load } from 'cheerio';

import { createDataset, type DatasetRecord } from '../dataset.js';
import { shouldSkipCatalog, shouldSkipDataset } from '../filter.js';
import { type Logger, logger as defaultLogger } from '../log.js';
import { type CatalogPage, type CatalogReader, type CatalogRef } from './catalog.js';

export const DefaultHyraxExtensions = ['.nc', '.nc4', '.hdf', '.h5'];
/** Used when extension detection finds no file links at all */
export const FallbackHyraxExtensions = ['.nc', '.nc4', '.hdf', '.h5', '.grib', '.grb', '.dods', '.dds', '.das'];

/** DAP response suffixes, a link to one of these points at the dataset without the suffix */
const DapSuffixes = ['.dods', '.dds', '.das'];

function decodeName(href: string): string {
  const trimmed = href.replace(/\/+$/, '');
  try {
    return decodeURIComponent(trimmed);
  } catch {
    return trimmed;
  }
}

function isIgnoredHref(href: string): boolean {
  return href === '' || href === '/' || href.startsWith('..');
}

export function isDatasetHref(href: string, extensions: string[]): boolean {
  if (isIgnoredHref(href)) return false;
  return extensions.some((ext) => href.endsWith(ext));
}

export function isDirectoryHref(href: string): boolean {
  if (isIgnoredHref(href)) return false;
  return href.endsWith('/');
}

/** OPeNDAP access url for a dataset link */
export function datasetUrl(href: string, base: URL): URL {
  const suffix = DapSuffixes.find((s) => href.endsWith(s));
  if (suffix == null) return new URL(href, base);
  return new URL(href.slice(0, -suffix.length), base);
}

function hrefs(html: string): string[] {
  const $ = load(html);
  const out: string[] = [];
  $('a').each((_, el) => {
    out.push($(el).attr('href') ?? '');
  });
  return out;
}

/**
 * Guess which file extensions hold datasets from the links on a directory page
 *
 * @returns extensions in the order first seen, or {@link FallbackHyraxExtensions} when there are no file links
 */
export function detectExtensions(html: string): string[] {
  const found = new Set<string>();
  for (const href of hrefs(html)) {
    if (isIgnoredHref(href) || href.endsWith('/')) continue;
    const dot = href.lastIndexOf('.');
    if (dot === -1) continue;
    found.add(href.slice(dot));
  }
  if (found.size === 0) return [...FallbackHyraxExtensions];
  return [...found];
}

export interface HyraxReaderOptions {
  extensions?: string[];
  filter?: boolean;
  logger?: Logger;
}

/** Reads Hyrax style html directory listings */
export class HyraxReader implements CatalogReader {
  readonly source = 'hyrax';
  extensions: string[];
  filter: boolean;
  logger: Logger;

  constructor(opts: HyraxReaderOptions = {}) {
    this.extensions = opts.extensions ?? [...DefaultHyraxExtensions];
    this.filter = opts.filter ?? false;
    this.logger = opts.logger ?? defaultLogger;
  }

  normalizeUrl(url: URL): URL {
    return url;
  }

  parse(html: string, url: URL): CatalogPage {
    const datasets: DatasetRecord[] = [];
    const children: CatalogRef[] = [];

    for (const href of hrefs(html)) {
      if (isDatasetHref(href, this.extensions)) {
        const name = decodeName(href);
        if (shouldSkipDataset(name, this.filter)) {
          this.logger.debug({ name }, 'hyrax:skip:dataset');
          continue;
        }
        const ds = createDataset(name, datasetUrl(href, url).href, 'hyrax');
        this.logger.debug({ id: ds.id, url: ds.url }, 'hyrax:dataset');
        datasets.push(ds);
      } else if (isDirectoryHref(href)) {
        const name = decodeName(href);
        if (shouldSkipCatalog(name, this.filter)) {
          this.logger.debug({ name }, 'hyrax:skip:directory');
          continue;
        }
        children.push({ name, url: new URL(href, url) });
      }
    }

    return { datasets, children };
  }
}
