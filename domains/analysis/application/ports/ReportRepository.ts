import type { AnalysisReport, ReportSummary } from '../../domain/entities/AnalysisReport';

/**
* Repository interface for AnalysisReport persistence
*/
export interface ReportRepository {
  /**
  * Persist a report under its filename
  */
  save(report: AnalysisReport): Promise<void>;

  /**
  * @param filename - Must already have passed isReportFilename
  * @returns The report or null when none is stored under that name
  */
  getByFilename(filename: string): Promise<AnalysisReport | null>;

  /**
  * Summaries of every stored report, newest first
  */
  list(): Promise<ReportSummary[]>;

  /**
  * Release held resources
  */
  close?(): Promise<void>;
}
