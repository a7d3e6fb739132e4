import { getLogger } from '@kernel/logger';

import type { AnalysisPayload, AnalysisType } from '../../domain/analysisTypes';
import { AnalysisReport } from '../../domain/entities/AnalysisReport';
import type { ReportRepository } from '../ports/ReportRepository';

const logger = getLogger('analysis:save-report');

/**
* Command handler that stores an analysis result under a new report filename.
*/
export class SaveReport {
  constructor(
    private readonly repo: ReportRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async execute(type: AnalysisType, url: string, payload: AnalysisPayload): Promise<AnalysisReport> {
    const report = AnalysisReport.create(type, url, payload, this.now());
    await this.repo.save(report);
    logger.info('Report saved', { filename: report.filename, type });
    return report;
  }
}
