import { describe, it, expect, beforeEach } from 'vitest';

import { ErrorCodes, StorageError } from '@errors';

import { AnalysisReport } from '../../../domain/entities/AnalysisReport';
import { PostgresReportRepository, type ReportQueryable } from '../PostgresReportRepository';

interface StoredRow {
  filename: string;
  type: string;
  url: string;
  created_at: Date;
  payload: unknown;
}

/**
 * In-process stand-in for a pg Pool that understands the repository's queries
 */
class FakePool implements ReportQueryable {
  readonly rows = new Map<string, StoredRow>();
  readonly queries: string[] = [];
  ended = false;
  failWith: Error | undefined;

  async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
    this.queries.push(text);
    if (this.failWith) throw this.failWith;

    if (text.startsWith('INSERT INTO analysis_reports')) {
      const [filename, type, url, createdAt, payload] = values;
      if (this.rows.has(String(filename))) {
        throw new Error('duplicate key value violates unique constraint "analysis_reports_pkey"');
      }
      this.rows.set(String(filename), {
        filename: String(filename),
        type: String(type),
        url: String(url),
        created_at: createdAt instanceof Date ? createdAt : new Date(String(createdAt)),
        payload: JSON.parse(String(payload)),
      });
      return { rows: [] };
    }

    if (text.startsWith('SELECT filename, url, created_at, payload')) {
      const row = this.rows.get(String(values[0]));
      return { rows: row ? [row] : [] };
    }

    if (text.startsWith('SELECT filename, created_at, octet_length')) {
      const rows = [...this.rows.values()]
        .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
        .map(row => ({
          filename: row.filename,
          created_at: row.created_at,
          // pg returns integer aggregates as strings
          size: String(Buffer.byteLength(JSON.stringify(row.payload), 'utf8')),
        }));
      return { rows };
    }

    throw new Error(`Unexpected query: ${text}`);
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

describe('PostgresReportRepository', () => {
  let pool: FakePool;
  let repo: PostgresReportRepository;

  beforeEach(() => {
    pool = new FakePool();
    repo = new PostgresReportRepository(pool);
  });

  it('round-trips a report', async () => {
    const report = AnalysisReport.create('comprehensive', 'https://example.com/', { comprehensiveScore: 70 }, new Date(2026, 9, 18, 9, 5, 7), 'abcdef');
    await repo.save(report);

    const loaded = await repo.getByFilename(report.filename);

    expect(loaded?.filename).toBe('comprehensive_report_20261018_090507_abcdef.json');
    expect(loaded?.type).toBe('comprehensive');
    expect(loaded?.url).toBe('https://example.com/');
    expect(loaded?.createdAt.getTime()).toBe(new Date(2026, 9, 18, 9, 5, 7).getTime());
    expect(loaded?.payload).toEqual({ comprehensiveScore: 70 });
  });

  it('returns null for an unknown filename', async () => {
    await expect(repo.getByFilename('seo_report_20261018_090507.json')).resolves.toBeNull();
  });

  it('lists summaries with numeric sizes', async () => {
    await repo.save(AnalysisReport.create('seo', 'https://a.example/', { score: 1 }, new Date(2026, 9, 17, 8, 0, 0), '111111'));
    await repo.save(AnalysisReport.create('ad', 'https://b.example/', {}, new Date(2026, 9, 18, 8, 0, 0), '222222'));

    const summaries = await repo.list();

    expect(summaries).toEqual([
      { filename: 'ad_report_20261018_080000_222222.json', type: 'ad', createdAt: '2026-10-18 08:00:00', size: 2 },
      { filename: 'seo_report_20261017_080000_111111.json', type: 'seo', createdAt: '2026-10-17 08:00:00', size: 11 },
    ]);
  });

  it('wraps driver errors in StorageError', async () => {
    pool.failWith = new Error('connection terminated unexpectedly');

    await expect(repo.list()).rejects.toMatchObject({ code: ErrorCodes.DATABASE_ERROR, statusCode: 500 });
    await expect(repo.getByFilename('seo_report_20261018_090507.json')).rejects.toBeInstanceOf(StorageError);
  });

  it('rejects rows whose payload is not an object', async () => {
    pool.rows.set('seo_report_20261018_090507.json', {
      filename: 'seo_report_20261018_090507.json',
      type: 'seo',
      url: 'https://example.com/',
      created_at: new Date(),
      payload: 'oops',
    });

    await expect(repo.getByFilename('seo_report_20261018_090507.json')).rejects.toMatchObject({
      message: 'Malformed report row seo_report_20261018_090507.json',
    });
  });

  it('ends the pool on close', async () => {
    await repo.close();
    expect(pool.ended).toBe(true);
  });
});
