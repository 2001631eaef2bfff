import { type DatasetEntry, scanSourceUrls, setTagAttr, spliceText, type TextEdit } from './config.file.js';
import { escapeXml } from './xml.js';

/**
 * Move an ERDDAP url onto another origin, keeping everything from `/erddap` on
 *
 * @returns the new url or null when the url is not an ERDDAP url
 */
export function rehostUrl(url: string, origin: string): string | null {
  const match = /^https?:\/\/[^/]+(\/erddap(?:[/?#].*)?)$/.exec(url.trim());
  if (match == null) return null;
  return origin.replace(/\/+$/, '') + match[1];
}

/** Point every ERDDAP `sourceUrl` of a configuration at another origin, nested datasets included */
export function rehostSourceUrls(text: string, origin: string): { text: string; changed: number } {
  const edits: TextEdit[] = [];
  for (const ref of scanSourceUrls(text)) {
    const next = rehostUrl(ref.url, origin);
    if (next == null || next === ref.url) continue;
    edits.push({ ...ref.span, text: escapeXml(next) });
  }
  return { text: spliceText(text, edits), changed: edits.length };
}

export interface MirrorTarget {
  /** ERDDAP that serves the converted OPeNDAP datasets, eg `https://mirror.example.org/erddap` */
  mirror: string;
  /** Origin that ERDDAP to ERDDAP entries are moved to */
  origin: string;
}

export interface MirrorResult {
  text: string;
  /** `EDDGridFromDap` entries now read from the mirror */
  converted: string[];
  /** `*FromErddap` entries moved to the new origin */
  repointed: string[];
}

/**
 * Rewrite a configuration so that every dataset is read through ERDDAP
 *
 * `EDDGridFromDap` entries become `EDDGridFromErddap` entries of the same id on the mirror, `EDDGridFromErddap` and
 * `EDDTableFromErddap` entries keep their path but move to the new origin. Only top level entries are changed.
 */
export function mirrorDatasets(text: string, entries: DatasetEntry[], target: MirrorTarget): MirrorResult {
  const mirror = target.mirror.replace(/\/+$/, '');
  const edits: TextEdit[] = [];
  const converted: string[] = [];
  const repointed: string[] = [];

  for (const e of entries) {
    if (e.type === 'EDDGridFromDap') {
      edits.push({ ...e.tag, text: setTagAttr(text.slice(e.tag.start, e.tag.end), 'type', 'EDDGridFromErddap') });
      if (e.sourceUrlSpan != null) {
        edits.push({ ...e.sourceUrlSpan, text: escapeXml(`${mirror}/griddap/${e.datasetId}`) });
      }
      converted.push(e.datasetId);
      continue;
    }

    if (e.type !== 'EDDGridFromErddap' && e.type !== 'EDDTableFromErddap') continue;
    if (e.sourceUrl == null || e.sourceUrlSpan == null) continue;
    const next = rehostUrl(e.sourceUrl, target.origin);
    if (next == null || next === e.sourceUrl) continue;
    edits.push({ ...e.sourceUrlSpan, text: escapeXml(next) });
    repointed.push(e.datasetId);
  }

  return { text: spliceText(text, edits), converted, repointed };
}
