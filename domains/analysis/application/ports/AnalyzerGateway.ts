import { type AnalysisPayload, type SingleAnalysisType } from '../../domain/analysisTypes';

/**
* Contract with the external analyzers: given a URL and one analysis type,
* return a structured result object or throw.
*
* Implementations throw AppError subclasses from @errors so the web layer can
* map failures to status codes and inline messages.
*/
export interface AnalyzerGateway {
  /**
  * Run a single analysis
  * @param type - Analysis to run
  * @param url - Validated http(s) URL
  * @param signal - Aborts the call when the request is abandoned
  */
  run(type: SingleAnalysisType, url: string, signal?: AbortSignal): Promise<AnalysisPayload>;
}
