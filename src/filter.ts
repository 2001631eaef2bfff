/** Name endings and fragments that mark a single time step granule rather than an aggregation */
const TimeSpecificPatterns = [
  /-\d{4}$/, // -YYYY
  /-\d{6}$/, // -YYYYMM
  /-\d{8}$/, // -YYYYMMDD
  /_\d{4}$/, // _YYYY
  /_\d{6}$/, // _YYYYMM
  /_\d{8}$/, // _YYYYMMDD
  /_\d{10}$/, // _YYYYMMDDHH
  /\.nc\d{8}/,
  /\d{4}_\d{2}_\d{2}/,
];

const IndividualFileWords = ['files', 'individual', 'single'];

export function isTimeSpecific(name: string): boolean {
  return TimeSpecificPatterns.some((re) => re.test(name));
}

/** Catalogs that list every granule one by one, eg "Individual Files" */
export function isIndividualFilesCatalog(name: string): boolean {
  const lower = name.toLowerCase();
  return IndividualFileWords.some((word) => lower.includes(word));
}

export function shouldSkipDataset(name: string, filter: boolean): boolean {
  return filter && isTimeSpecific(name);
}

export function shouldSkipCatalog(name: string, filter: boolean): boolean {
  return filter && (isTimeSpecific(name) || isIndividualFilesCatalog(name));
}
