import { getHostname } from '@utils/url';

import {
  type AnalysisPayload,
  type SingleAnalysisType,
  SINGLE_ANALYSIS_TYPES,
  isJsonObject,
  numberField,
  stringListField,
} from './analysisTypes';
import { formatTimestamp } from './reportFilename';

/**
* Comprehensive run: one score, one rating and one recommendation list built
* from the six single analyses.
*/

export const MAX_COMPREHENSIVE_RECOMMENDATIONS = 10;

/** Page speed sections that carry their own recommendation lists */
export const PAGESPEED_RECOMMENDATION_SECTIONS = [
  'render_blocking',
  'image_optimization',
  'minification',
  'caching',
] as const;

/** Key of each sub-analysis in `detailedResults` and `failures` */
export const DETAILED_RESULT_KEYS: Readonly<Record<SingleAnalysisType, string>> = {
  seo: 'seo',
  mobile: 'mobile',
  pagespeed: 'pagespeed',
  ad: 'ads',
  searchconsole: 'searchconsole',
  analytics: 'analytics',
};

export function analysisTypeForResultKey(key: string): SingleAnalysisType | undefined {
  return SINGLE_ANALYSIS_TYPES.find(type => DETAILED_RESULT_KEYS[type] === key);
}

export type ComprehensiveRating = 'Excellent' | 'Good' | 'Fair' | 'Needs improvement';

export type SubAnalysisResults = Partial<Record<SingleAnalysisType, AnalysisPayload>>;
export type SubAnalysisFailures = Partial<Record<SingleAnalysisType, string>>;

export type ComprehensiveResult = {
  url: string;
  domain: string;
  timestamp: string;
  comprehensiveScore: number;
  comprehensiveRating: ComprehensiveRating;
  recommendations: string[];
  detailedResults: { [key: string]: AnalysisPayload };
  failures: { [key: string]: string };
};

export function ratingForScore(score: number): ComprehensiveRating {
  if (score >= 90) return 'Excellent';
  if (score >= 70) return 'Good';
  if (score >= 50) return 'Fair';
  return 'Needs improvement';
}

/** Nearest integer, ties to the even neighbour */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
* Average of the seo, mobile-friendly and page-speed scores that are present,
* rounded half to even; 0 when none is.
*/
export function comprehensiveScore(results: SubAnalysisResults): number {
  const scores = [
    numberField(results.seo, 'score'),
    numberField(results.mobile, 'mobile_friendly_score'),
    numberField(results.pagespeed, 'page_speed_score'),
  ].filter((score): score is number => score !== undefined);

  const total = scores.reduce((sum, score) => sum + score, 0);
  return roundHalfToEven(total / Math.max(1, scores.length));
}

/**
* Recommendations in dispatch order (seo, mobile, page speed sections,
* Search Console, Analytics), first occurrence wins, capped at ten.
*/
export function mergeRecommendations(results: SubAnalysisResults): string[] {
  const candidates: string[] = [
    ...stringListField(results.seo, 'recommendations'),
    ...stringListField(results.mobile, 'recommendations'),
  ];

  const pagespeed = results.pagespeed;
  for (const section of PAGESPEED_RECOMMENDATION_SECTIONS) {
    const sectionPayload = pagespeed?.[section];
    if (isJsonObject(sectionPayload)) {
      candidates.push(...stringListField(sectionPayload, 'recommendations'));
    }
  }

  candidates.push(
    ...stringListField(results.searchconsole, 'recommendations'),
    ...stringListField(results.analytics, 'recommendations'),
  );

  return [...new Set(candidates)].slice(0, MAX_COMPREHENSIVE_RECOMMENDATIONS);
}

export function aggregateComprehensive(
  url: string,
  results: SubAnalysisResults,
  failures: SubAnalysisFailures = {},
  now: Date = new Date()
): ComprehensiveResult {
  const seoDomain = results.seo?.['domain'];
  const score = comprehensiveScore(results);

  // Dispatch order, whatever order the sub-analyses settled in
  const detailedResults: { [key: string]: AnalysisPayload } = {};
  const failureMessages: { [key: string]: string } = {};
  for (const type of SINGLE_ANALYSIS_TYPES) {
    const payload = results[type];
    const message = failures[type];
    if (payload) detailedResults[DETAILED_RESULT_KEYS[type]] = payload;
    if (message !== undefined) failureMessages[DETAILED_RESULT_KEYS[type]] = message;
  }

  return {
    url,
    domain: typeof seoDomain === 'string' && seoDomain ? seoDomain : getHostname(url),
    timestamp: formatTimestamp(now),
    comprehensiveScore: score,
    comprehensiveRating: ratingForScore(score),
    recommendations: mergeRecommendations(results),
    detailedResults,
    failures: failureMessages,
  };
}
