import { randomBytes } from 'crypto';

import { type AnalysisPayload, type AnalysisType } from '../analysisTypes';
import {
  analysisTypeFromFilename,
  buildReportFilename,
  formatTimestamp,
  isReportFilename,
} from '../reportFilename';

/**
* Listing entry for a stored report
*/
export interface ReportSummary {
  filename: string;
  type: AnalysisType | 'unknown';
  /** Local time, YYYY-MM-DD HH:mm:ss */
  createdAt: string;
  /** Bytes of the serialized report */
  size: number;
}

/**
* AnalysisReport - Immutable domain entity for a stored analysis result
*/
export class AnalysisReport {
  private constructor(
    public readonly filename: string,
    public readonly type: AnalysisType,
    public readonly url: string,
    public readonly createdAt: Date,
    public readonly payload: AnalysisPayload
  ) {}

  /**
  * Create a new report with a fresh filename
  * @param suffix - Six hex characters; random when omitted
  */
  static create(
    type: AnalysisType,
    url: string,
    payload: AnalysisPayload,
    createdAt: Date = new Date(),
    suffix: string = randomBytes(3).toString('hex')
  ): AnalysisReport {
    return new AnalysisReport(buildReportFilename(type, createdAt, suffix), type, url, createdAt, payload);
  }

  /**
  * Reconstitute from persistence
  * @throws Error when the filename is not a report filename
  */
  static reconstitute(
    filename: string,
    url: string,
    createdAt: Date,
    payload: AnalysisPayload
  ): AnalysisReport {
    if (!isReportFilename(filename)) {
      throw new Error(`Invalid report filename: ${filename}`);
    }
    const type = analysisTypeFromFilename(filename);
    if (type === 'unknown') {
      throw new Error(`Invalid report filename: ${filename}`);
    }
    return new AnalysisReport(filename, type, url, createdAt, payload);
  }

  /**
  * Stored representation: UTF-8 JSON, 2-space indent
  */
  serialize(): string {
    return JSON.stringify(this.payload, null, 2);
  }

  get size(): number {
    return Buffer.byteLength(this.serialize(), 'utf8');
  }

  toSummary(): ReportSummary {
    return {
      filename: this.filename,
      type: this.type,
      createdAt: formatTimestamp(this.createdAt),
      size: this.size,
    };
  }
}

/**
* Newest first; ties keep their input order
*/
export function sortSummariesNewestFirst(summaries: ReportSummary[]): ReportSummary[] {
  return [...summaries].sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
}
