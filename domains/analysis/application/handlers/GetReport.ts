import { NotFoundError } from '@errors';

import type { AnalysisReport } from '../../domain/entities/AnalysisReport';
import { isReportFilename } from '../../domain/reportFilename';
import type { ReportRepository } from '../ports/ReportRepository';

/**
* Query handler for a single stored report.
*
* Names that are not report filenames are answered exactly like missing
* reports and never reach the repository.
*
* @throws NotFoundError
*/
export class GetReport {
  constructor(private readonly repo: ReportRepository) {}

  async execute(filename: string): Promise<AnalysisReport> {
    if (!isReportFilename(filename)) {
      throw NotFoundError.report();
    }
    const report = await this.repo.getByFilename(filename);
    if (!report) {
      throw NotFoundError.report();
    }
    return report;
  }
}
