import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises';
import path from 'path';

import { getLogger } from '@kernel/logger';
import { ErrorCodes, StorageError, toError } from '@errors';

import { isJsonObject } from '../../domain/analysisTypes';
import { AnalysisReport, type ReportSummary } from '../../domain/entities/AnalysisReport';
import { analysisTypeFromFilename, formatTimestamp, isReportFilename } from '../../domain/reportFilename';
import type { ReportRepository } from '../../application/ports/ReportRepository';

const logger = getLogger('analysis:file-repository');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
* Report repository keeping one JSON file per report in a directory.
*
* The file body is the analysis payload itself; the URL is read back from its
* `url` field and the creation time from the file's modification time.
*/
export class FileReportRepository implements ReportRepository {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = path.resolve(dir);
  }

  async save(report: AnalysisReport): Promise<void> {
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(this.pathFor(report.filename), report.serialize(), { encoding: 'utf8', flag: 'wx' });
    } catch (error: unknown) {
      logger.error('Failed to write report', toError(error), { filename: report.filename });
      throw new StorageError('Failed to save report', ErrorCodes.STORAGE_ERROR, toError(error));
    }
  }

  async getByFilename(filename: string): Promise<AnalysisReport | null> {
    if (!isReportFilename(filename)) {
      return null;
    }
    const filePath = this.pathFor(filename);

    let raw: string;
    let modifiedAt: Date;
    try {
      [raw, modifiedAt] = await Promise.all([
        readFile(filePath, 'utf8'),
        stat(filePath).then(s => s.mtime),
      ]);
    } catch (error: unknown) {
      if (isMissingFile(error)) return null;
      logger.error('Failed to read report', toError(error), { filename });
      throw new StorageError('Failed to read report', ErrorCodes.STORAGE_ERROR, toError(error));
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error: unknown) {
      throw new StorageError(`Report ${filename} is not valid JSON`, ErrorCodes.STORAGE_ERROR, toError(error));
    }
    if (!isJsonObject(payload)) {
      throw new StorageError(`Report ${filename} is not a JSON object`);
    }

    const url = typeof payload['url'] === 'string' ? payload['url'] : '';
    return AnalysisReport.reconstitute(filename, url, modifiedAt, payload);
  }

  async list(): Promise<ReportSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error: unknown) {
      if (isMissingFile(error)) return [];
      logger.error('Failed to list reports', toError(error), { dir: this.dir });
      throw new StorageError('Failed to list reports', ErrorCodes.STORAGE_ERROR, toError(error));
    }

    const summaries = await Promise.all(
      entries
        .filter(name => name.endsWith('.json'))
        .map(async (name): Promise<ReportSummary | null> => {
          try {
            const info = await stat(this.pathFor(name));
            if (!info.isFile()) return null;
            return {
              filename: name,
              type: analysisTypeFromFilename(name),
              createdAt: formatTimestamp(info.mtime),
              size: info.size,
            };
          } catch (error: unknown) {
            // Removed between readdir and stat
            if (isMissingFile(error)) return null;
            throw error;
          }
        })
    );

    return summaries.filter((s): s is ReportSummary => s !== null);
  }

  private pathFor(filename: string): string {
    return path.join(this.dir, path.basename(filename));
  }
}
