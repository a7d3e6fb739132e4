import { ServiceUnavailableError } from '@errors';

import type { AnalysisPayload, SingleAnalysisType } from '../../domain/analysisTypes';
import type { AnalyzerGateway } from '../../application/ports/AnalyzerGateway';

/**
* Stand-in used when ANALYZER_SERVICE_URL is not set. Every run fails with 503.
*/
export class UnconfiguredAnalyzerGateway implements AnalyzerGateway {
  async run(_type: SingleAnalysisType, _url: string): Promise<AnalysisPayload> {
    throw new ServiceUnavailableError('Analysis service is not configured');
  }
}
