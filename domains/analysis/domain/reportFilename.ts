import { type AnalysisType, ANALYSIS_TYPES } from './analysisTypes';

/**
* Report filenames: <type>_report_<YYYYMMDD>_<HHmmss>[_<6 hex>].json
*
* The filename is the report's public identifier in URLs, so it is also the
* only gate between a request parameter and the storage layer. Names without
* the random suffix are accepted for reports written before it existed.
*/

const REPORT_FILENAME_RE = new RegExp(
  `^(${ANALYSIS_TYPES.join('|')})_report_\\d{8}_\\d{6}(?:_[a-f0-9]{6})?\\.json$`
);

const TYPE_PREFIXES: ReadonlyArray<[string, AnalysisType]> = [
  ['seo_', 'seo'],
  ['ad_', 'ad'],
  ['mobile_', 'mobile'],
  ['pagespeed_', 'pagespeed'],
  ['searchconsole_', 'searchconsole'],
  ['analytics_', 'analytics'],
  ['comprehensive_', 'comprehensive'],
];

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
* Local-time stamp used in filenames, e.g. 20261018_090507
*/
export function formatFileStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
* Local-time display timestamp, e.g. 2026-10-18 09:05:07
*/
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function buildReportFilename(type: AnalysisType, date: Date, suffix: string): string {
  if (!/^[a-f0-9]{6}$/.test(suffix)) {
    throw new Error('suffix must be 6 lowercase hex characters');
  }
  return `${type}_report_${formatFileStamp(date)}_${suffix}.json`;
}

export function isReportFilename(name: string): boolean {
  return REPORT_FILENAME_RE.test(name);
}

/**
* Analysis type encoded in a report filename's prefix
*/
export function analysisTypeFromFilename(filename: string): AnalysisType | 'unknown' {
  for (const [prefix, type] of TYPE_PREFIXES) {
    if (filename.startsWith(prefix)) return type;
  }
  return 'unknown';
}
