/** A single DAS attribute value, tagged with the kind the DAS type declared */
export type AttrValue =
  | { type: 'string'; value: string }
  | { type: 'float'; value: number; raw: string }
  | { type: 'int'; value: number; raw: string };

/** Attribute name to value, in document order */
export type AttributeMap = Map<string, AttrValue>;

export type DatasetSource = 'thredds' | 'hyrax';

export interface DatasetRecord {
  id: string;
  /** Display name as found in the catalog */
  name: string;
  /** OPeNDAP access url, without any `.das` / `.dds` suffix */
  url: string;
  source: DatasetSource;
  global: AttributeMap;
  variables: Map<string, AttributeMap>;
  metadata: 'pending' | 'ok' | 'failed';
}

/**
 * Derive a dataset id from a display name
 *
 * @example
 * ```typescript
 * generateDatasetId('SST Monthly (v2)') // "sst_monthly__v2_"
 * generateDatasetId('2024 sst') // "ds_2024_sst"
 * ```
 */
export function generateDatasetId(name: string): string {
  const clean = name.replace(/[^a-zA-Z0-9]/g, '_');
  if (!/^[a-zA-Z]/.test(clean)) return ('ds_' + clean).toLowerCase();
  return clean.toLowerCase();
}

export function createDataset(name: string, url: string, source: DatasetSource, id?: string | null): DatasetRecord {
  return {
    id: id == null || id === '' ? generateDatasetId(name) : id,
    name,
    url,
    source,
    global: new Map(),
    variables: new Map(),
    metadata: 'pending',
  };
}

/** True if the DAS gave the dataset a global attribute or at least one variable section */
export function hasMetadata(ds: DatasetRecord): boolean {
  return ds.global.size > 0 || ds.variables.size > 0;
}

export function attrText(attr: AttrValue): string {
  return attr.type === 'string' ? attr.value : attr.raw;
}
