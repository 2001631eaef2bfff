import { type Cheerio, type CheerioAPI, load } from 'cheerio';
import type { Element } from 'domhandler';

import { createDataset, type DatasetRecord, generateDatasetId } from '../dataset.js';
import { shouldSkipCatalog, shouldSkipDataset } from '../filter.js';
import { type FetchFn, request } from '../http.js';
import { type Logger, logger as defaultLogger } from '../log.js';
import { type CatalogPage, type CatalogReader, type CatalogRef } from './catalog.js';

export type ThreddsVersion = 4 | 5;

interface ThreddsService {
  name: string;
  /** Lower cased service types, a compound service carries the types of every nested service */
  types: Set<string>;
  base: string | null;
}

const OpendapTypes = ['opendap', 'dods'];

function isOpendap(service: ThreddsService | undefined): service is ThreddsService {
  if (service == null) return false;
  return OpendapTypes.some((t) => service.types.has(t));
}

/** Only ids that are already valid ERDDAP dataset ids are kept verbatim */
function datasetId(declared: string | undefined, name: string): string {
  if (declared == null || declared === '') return generateDatasetId(name);
  if (/^[a-zA-Z][a-zA-Z0-9_]*$/.test(declared)) return declared;
  return generateDatasetId(declared);
}

function joinPath(base: string, path: string): string {
  return base.replace(/\/+$/, '') + '/' + path.replace(/^\/+/, '');
}

export interface ThreddsReaderOptions {
  version?: ThreddsVersion;
  filter?: boolean;
  logger?: Logger;
}

/** Reads THREDDS InvCatalog xml documents */
export class ThreddsReader implements CatalogReader {
  readonly source = 'thredds';
  version: ThreddsVersion;
  filter: boolean;
  logger: Logger;

  constructor(opts: ThreddsReaderOptions = {}) {
    this.version = opts.version ?? 4;
    this.filter = opts.filter ?? false;
    this.logger = opts.logger ?? defaultLogger;
  }

  /** THREDDS serves the same catalog as html and xml, only the xml form is parsed */
  normalizeUrl(url: URL): URL {
    if (!url.pathname.endsWith('.html')) return url;
    const next = new URL(url.href);
    next.pathname = url.pathname.slice(0, -'.html'.length) + '.xml';
    return next;
  }

  parse(xml: string, url: URL): CatalogPage {
    const $ = load(xml, { xml: true });
    const services = this.readServices($);
    return { datasets: this.extractDatasets($, services, url), children: this.findCatalogRefs($, url) };
  }

  readServices($: CheerioAPI): Map<string, ThreddsService> {
    const services = new Map<string, ThreddsService>();
    $('service').each((_, el) => {
      const node = $(el);
      const name = node.attr('name');
      const serviceType = node.attr('serviceType');
      if (name == null || serviceType == null) return;
      const types = new Set([serviceType.toLowerCase()]);
      node.find('service').each((_, child) => {
        const childType = $(child).attr('serviceType');
        if (childType != null) types.add(childType.toLowerCase());
      });
      services.set(name, { name, types, base: this.opendapBase($, el) });
    });
    return services;
  }

  /** Base path of the service, or of the OPeNDAP service nested inside a compound service */
  private opendapBase($: CheerioAPI, el: Element): string | null {
    const node = $(el);
    const own = node.attr('serviceType')?.toLowerCase();
    if (own != null && OpendapTypes.includes(own)) return node.attr('base') ?? null;
    for (const child of node.find('service').toArray()) {
      const childType = $(child).attr('serviceType')?.toLowerCase();
      if (childType != null && OpendapTypes.includes(childType)) return $(child).attr('base') ?? null;
    }
    return null;
  }

  /** Service name declared on the dataset itself or inherited from an enclosing dataset */
  private serviceNameOf(node: Cheerio<Element>): string | null {
    let current = node;
    while (current.length > 0) {
      const attr = current.attr('serviceName');
      if (attr != null && attr !== '') return attr;
      const child = current.children('serviceName').first().text().trim();
      if (child !== '') return child;
      const meta = current.children('metadata').children('serviceName').first().text().trim();
      if (meta !== '') return meta;
      current = current.parent('dataset');
    }
    return null;
  }

  /** Without a service base the OPeNDAP endpoint is guessed from the catalog url */
  resolveAccessUrl(path: string, service: ThreddsService, catalogUrl: URL): URL {
    if (service.base != null && service.base !== '') return new URL(joinPath(service.base, path), catalogUrl);
    if (this.version === 5) return new URL(path, catalogUrl.href.replace('/catalog/', '/dodsC/'));
    return new URL(path, catalogUrl);
  }

  extractDatasets($: CheerioAPI, services: Map<string, ThreddsService>, catalogUrl: URL): DatasetRecord[] {
    const datasets: DatasetRecord[] = [];
    const anyOpendap = [...services.values()].find((s) => isOpendap(s)) ?? null;

    $('dataset').each((_, el) => {
      const node = $(el);
      const name = node.attr('name');
      if (name == null) return;

      if (shouldSkipDataset(name, this.filter)) {
        this.logger.debug({ name }, 'thredds:skip:dataset');
        return;
      }
      // Containers of catalog references are not datasets
      if (node.find('catalogRef').length > 0) return;

      let accessUrl: URL | null = null;
      for (const access of node.children('access').toArray()) {
        const service = services.get($(access).attr('serviceName') ?? '');
        const accessPath = $(access).attr('urlPath');
        if (!isOpendap(service) || accessPath == null || accessPath === '') continue;
        accessUrl = this.resolveAccessUrl(accessPath, service, catalogUrl);
        break;
      }

      const urlPath = node.attr('urlPath');
      if (accessUrl == null && urlPath != null && urlPath !== '') {
        const declared = services.get(this.serviceNameOf(node) ?? '');
        // A dataset bound to a known non OPeNDAP service is download only
        if (declared == null) {
          if (anyOpendap != null) accessUrl = this.resolveAccessUrl(urlPath, anyOpendap, catalogUrl);
        } else if (isOpendap(declared)) {
          accessUrl = this.resolveAccessUrl(urlPath, declared, catalogUrl);
        }
      }

      if (accessUrl == null) return;
      const ds = createDataset(name, accessUrl.href, 'thredds', datasetId(node.attr('ID'), name));
      this.logger.debug({ id: ds.id, url: ds.url }, 'thredds:dataset');
      datasets.push(ds);
    });

    return datasets;
  }

  findCatalogRefs($: CheerioAPI, catalogUrl: URL): CatalogRef[] {
    const refs: CatalogRef[] = [];
    $('catalogRef').each((_, el) => {
      const node = $(el);
      let href = node.attr('xlink:href');
      let name = node.attr('xlink:title') ?? href;
      if (href == null || href === '') {
        href = node.attr('href');
        name = node.attr('name') ?? href;
      }
      if (href == null || href === '' || name == null) return;

      if (shouldSkipCatalog(name, this.filter)) {
        this.logger.debug({ name }, 'thredds:skip:catalog');
        return;
      }

      let full = new URL(href, catalogUrl).href;
      if (this.version === 5 && !full.endsWith('.xml')) full = joinPath(full, 'catalog.xml');
      refs.push({ name, url: new URL(full) });
    });
    return refs;
  }
}

export interface DetectOptions {
  fetch?: FetchFn;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Work out which major THREDDS version serves a catalog
 *
 * Checks the server info page first then the root catalog namespace, defaulting to 4
 */
export async function detectThreddsVersion(catalogUrl: URL, opts: DetectOptions = {}): Promise<ThreddsVersion> {
  const log = opts.logger ?? defaultLogger;
  const req = { fetch: opts.fetch, timeoutMs: opts.timeoutMs ?? 10_000 };

  const info = await request(new URL('/thredds/info/serverInfo.html', catalogUrl), req);
  if (info.ok) {
    const content = info.text.toLowerCase();
    if (content.includes('thredds data server version 5') || content.includes('tds version 5')) {
      log.debug({ version: 5, from: 'serverInfo' }, 'thredds:version');
      return 5;
    }
    if (content.includes('thredds data server version 4') || content.includes('tds version 4')) {
      log.debug({ version: 4, from: 'serverInfo' }, 'thredds:version');
      return 4;
    }
  }

  const root = await request(new URL('/thredds/catalog.xml', catalogUrl), req);
  if (root.ok && root.text.includes('xmlns="http://www.unidata.ucar.edu/namespaces/thredds/InvCatalog/v1.2"')) {
    log.debug({ version: 5, from: 'namespace' }, 'thredds:version');
    return 5;
  }

  log.debug({ version: 4, from: 'default' }, 'thredds:version');
  return 4;
}
