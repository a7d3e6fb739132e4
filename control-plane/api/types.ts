import type { GetReport } from '../../domains/analysis/application/handlers/GetReport';
import type { ListReports } from '../../domains/analysis/application/handlers/ListReports';
import type { RunAnalysis } from '../../domains/analysis/application/handlers/RunAnalysis';
import type { SaveReport } from '../../domains/analysis/application/handlers/SaveReport';

/**
* Application handlers shared by the route modules
*/
export interface AnalysisHandlers {
  runAnalysis: RunAnalysis;
  saveReport: SaveReport;
  getReport: GetReport;
  listReports: ListReports;
}

export interface AnalysisRouteOptions {
  /** Budget for the analyzer work behind one request */
  requestTimeoutMs: number;
}
