/**
* Analysis types offered by the form, and the JSON shape analyzers return.
*/

export const ANALYSIS_TYPES = [
  'seo',
  'comprehensive',
  'mobile',
  'pagespeed',
  'searchconsole',
  'analytics',
  'ad',
] as const;

export type AnalysisType = typeof ANALYSIS_TYPES[number];

/** Every type an external analyzer handles on its own */
export type SingleAnalysisType = Exclude<AnalysisType, 'comprehensive'>;

/** Order in which a comprehensive run dispatches its sub-analyses */
export const SINGLE_ANALYSIS_TYPES: readonly SingleAnalysisType[] = [
  'seo',
  'mobile',
  'pagespeed',
  'ad',
  'searchconsole',
  'analytics',
];

export const DEFAULT_ANALYSIS_TYPE: AnalysisType = 'seo';

export const ANALYSIS_TYPE_LABELS: Readonly<Record<AnalysisType, string>> = {
  seo: 'Basic SEO',
  comprehensive: 'Comprehensive',
  mobile: 'Mobile friendliness',
  pagespeed: 'Page speed',
  searchconsole: 'Search Console',
  analytics: 'Analytics',
  ad: 'Ad analysis',
};

export function isAnalysisType(value: unknown): value is AnalysisType {
  return typeof value === 'string' && (ANALYSIS_TYPES as readonly string[]).includes(value);
}

export function isSingleAnalysisType(value: unknown): value is SingleAnalysisType {
  return isAnalysisType(value) && value !== 'comprehensive';
}

// ============================================================================
// Analyzer payloads
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** Structured result object returned by an analyzer */
export type AnalysisPayload = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is AnalysisPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
* Finite number stored under `key`, or undefined
*/
export function numberField(payload: AnalysisPayload | undefined, key: string): number | undefined {
  const value = payload?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
* String entries of the array stored under `key`; other entries are skipped
*/
export function stringListField(payload: AnalysisPayload | undefined, key: string): string[] {
  const value = payload?.[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}
