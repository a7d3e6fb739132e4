import { type ReportSummary, sortSummariesNewestFirst } from '../../domain/entities/AnalysisReport';
import type { ReportRepository } from '../ports/ReportRepository';

/**
* Query handler listing stored reports, newest first
*/
export class ListReports {
  constructor(private readonly repo: ReportRepository) {}

  async execute(): Promise<ReportSummary[]> {
    return sortSummariesNewestFirst(await this.repo.list());
  }
}
