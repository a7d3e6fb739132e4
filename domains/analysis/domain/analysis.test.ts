import { describe, it, expect } from 'vitest';

import {
  isAnalysisType,
  isJsonObject,
  isSingleAnalysisType,
  numberField,
  stringListField,
} from './analysisTypes';
import {
  analysisTypeFromFilename,
  buildReportFilename,
  formatFileStamp,
  formatTimestamp,
  isReportFilename,
} from './reportFilename';

describe('analysis types', () => {
  it('accepts the seven type tags only', () => {
    for (const type of ['seo', 'comprehensive', 'mobile', 'pagespeed', 'searchconsole', 'analytics', 'ad']) {
      expect(isAnalysisType(type)).toBe(true);
    }
    expect(isAnalysisType('SEO')).toBe(false);
    expect(isAnalysisType('backlink')).toBe(false);
    expect(isAnalysisType(undefined)).toBe(false);
  });

  it('treats comprehensive as a composite type', () => {
    expect(isSingleAnalysisType('seo')).toBe(true);
    expect(isSingleAnalysisType('comprehensive')).toBe(false);
  });

  it('reads finite numbers only', () => {
    expect(numberField({ score: 80 }, 'score')).toBe(80);
    expect(numberField({ score: '80' }, 'score')).toBeUndefined();
    expect(numberField({ score: Number.POSITIVE_INFINITY }, 'score')).toBeUndefined();
    expect(numberField(undefined, 'score')).toBeUndefined();
  });

  it('keeps string entries of a list', () => {
    expect(stringListField({ recommendations: ['a', 1, 'b', null] }, 'recommendations')).toEqual(['a', 'b']);
    expect(stringListField({ recommendations: 'a' }, 'recommendations')).toEqual([]);
  });

  it('recognizes JSON objects', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });
});

describe('report filenames', () => {
  const date = new Date(2026, 9, 18, 9, 5, 7);

  it('formats local time stamps', () => {
    expect(formatFileStamp(date)).toBe('20261018_090507');
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02 03:04:05');
  });

  it('builds <type>_report_<stamp>_<suffix>.json', () => {
    expect(buildReportFilename('seo', date, 'a1b2c3')).toBe('seo_report_20261018_090507_a1b2c3.json');
    expect(buildReportFilename('comprehensive', date, '000000')).toBe('comprehensive_report_20261018_090507_000000.json');
  });

  it('rejects suffixes that are not six lowercase hex characters', () => {
    expect(() => buildReportFilename('seo', date, 'A1B2C3')).toThrow('suffix must be 6 lowercase hex characters');
    expect(() => buildReportFilename('seo', date, 'abc')).toThrow();
  });

  it('accepts generated names and names without a suffix', () => {
    expect(isReportFilename('seo_report_20261018_090507_a1b2c3.json')).toBe(true);
    expect(isReportFilename('mobile_report_20260101_000000.json')).toBe(true);
  });

  it('rejects anything that could leave the reports directory', () => {
    expect(isReportFilename('../seo_report_20261018_090507.json')).toBe(false);
    expect(isReportFilename('seo_report_20261018_090507.json/../../etc/passwd')).toBe(false);
    expect(isReportFilename('..%2Fseo_report_20261018_090507.json')).toBe(false);
    expect(isReportFilename('backlink_report_20261018_090507.json')).toBe(false);
    expect(isReportFilename('seo_report_20261018_090507_A1B2C3.json')).toBe(false);
    expect(isReportFilename('seo_report_20261018_090507.json.bak')).toBe(false);
  });

  it('infers the type from the prefix', () => {
    expect(analysisTypeFromFilename('searchconsole_report_20261018_090507.json')).toBe('searchconsole');
    expect(analysisTypeFromFilename('ad_report_20261018_090507.json')).toBe('ad');
    expect(analysisTypeFromFilename('notes.json')).toBe('unknown');
  });
});
