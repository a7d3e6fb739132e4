import { z } from 'zod';

import { getLogger } from '@kernel/logger';
import { ErrorCodes, StorageError, toError } from '@errors';

import { type AnalysisPayload, isJsonObject } from '../../domain/analysisTypes';
import { AnalysisReport, type ReportSummary } from '../../domain/entities/AnalysisReport';
import { analysisTypeFromFilename, formatTimestamp } from '../../domain/reportFilename';
import type { ReportRepository } from '../../application/ports/ReportRepository';

const logger = getLogger('analysis:pg-repository');

/**
* The part of a pg `Pool` this repository uses
*/
export interface ReportQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

const ReportRowSchema = z.object({
  filename: z.string(),
  url: z.string(),
  created_at: z.coerce.date(),
  payload: z.custom<AnalysisPayload>(isJsonObject, { message: 'payload must be a JSON object' }),
});

const SummaryRowSchema = z.object({
  filename: z.string(),
  created_at: z.coerce.date(),
  size: z.coerce.number().int().nonnegative(),
});

/**
* Repository implementation for AnalysisReport using PostgreSQL
*
* Table: analysis_reports (migrations/sql/001_create_analysis_reports.up.sql)
*/
export class PostgresReportRepository implements ReportRepository {
  constructor(private readonly pool: ReportQueryable) {}

  async save(report: AnalysisReport): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO analysis_reports (filename, type, url, created_at, payload)
        VALUES ($1, $2, $3, $4, $5::jsonb)`,
        [report.filename, report.type, report.url, report.createdAt, report.serialize()]
      );
    } catch (error: unknown) {
      logger.error('Failed to save report', toError(error), { filename: report.filename });
      throw new StorageError('Failed to save report', ErrorCodes.DATABASE_ERROR, toError(error));
    }
  }

  async getByFilename(filename: string): Promise<AnalysisReport | null> {
    let rows: unknown[];
    try {
      ({ rows } = await this.pool.query(
        `SELECT filename, url, created_at, payload
        FROM analysis_reports
        WHERE filename = $1`,
        [filename]
      ));
    } catch (error: unknown) {
      logger.error('Failed to get report by filename', toError(error), { filename });
      throw new StorageError('Failed to read report', ErrorCodes.DATABASE_ERROR, toError(error));
    }

    if (rows.length === 0) {
      return null;
    }
    const parsed = ReportRowSchema.safeParse(rows[0]);
    if (!parsed.success) {
      throw new StorageError(`Malformed report row ${filename}`, ErrorCodes.DATABASE_ERROR);
    }
    const r = parsed.data;
    return AnalysisReport.reconstitute(r.filename, r.url, r.created_at, r.payload);
  }

  async list(): Promise<ReportSummary[]> {
    let rows: unknown[];
    try {
      ({ rows } = await this.pool.query(
        `SELECT filename, created_at, octet_length(payload::text) AS size
        FROM analysis_reports
        ORDER BY created_at DESC`
      ));
    } catch (error: unknown) {
      logger.error('Failed to list reports', toError(error));
      throw new StorageError('Failed to list reports', ErrorCodes.DATABASE_ERROR, toError(error));
    }

    return rows.map(row => {
      const parsed = SummaryRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new StorageError('Malformed report row', ErrorCodes.DATABASE_ERROR);
      }
      const r = parsed.data;
      return {
        filename: r.filename,
        type: analysisTypeFromFilename(r.filename),
        createdAt: formatTimestamp(r.created_at),
        size: r.size,
      };
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
