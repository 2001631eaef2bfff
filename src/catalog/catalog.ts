import { type DatasetRecord, type DatasetSource } from '../dataset.js';

/** A reference to a child catalog or directory */
export interface CatalogRef {
  name: string;
  url: URL;
}

/** Everything found on a single catalog document */
export interface CatalogPage {
  datasets: DatasetRecord[];
  children: CatalogRef[];
}

/** Reads one catalog dialect, turning a fetched document into datasets and child references */
export interface CatalogReader {
  readonly source: DatasetSource;
  /** Url that should actually be requested for a catalog reference */
  normalizeUrl(url: URL): URL;
  parse(body: string, url: URL): CatalogPage;
}
