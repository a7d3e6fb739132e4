import pLimit from 'p-limit';

import { getLogger } from '@kernel/logger';
import { AnalyzerError, ErrorCodes, ValidationError, getErrorMessage } from '@errors';
import { isValidHttpUrl } from '@utils/url';

import {
  type AnalysisPayload,
  type AnalysisType,
  SINGLE_ANALYSIS_TYPES,
  isAnalysisType,
} from '../../domain/analysisTypes';
import {
  type SubAnalysisFailures,
  type SubAnalysisResults,
  aggregateComprehensive,
} from '../../domain/comprehensive';
import type { AnalyzerGateway } from '../ports/AnalyzerGateway';

const logger = getLogger('analysis:run');

export interface RunAnalysisOptions {
  /** Sub-analyses of a comprehensive run in flight at once */
  concurrency?: number;
  /** Clock for the comprehensive timestamp */
  now?: () => Date;
}

/**
* Command handler that runs one analysis type against a URL.
*
* Single types are one gateway call. `comprehensive` dispatches all six single
* types with bounded concurrency, records individual failures next to the
* results and only fails when every sub-analysis failed.
*
* @throws ValidationError for a bad URL or type, or whatever the gateway throws
*/
export class RunAnalysis {
  private readonly concurrency: number;
  private readonly now: () => Date;

  constructor(
    private readonly gateway: AnalyzerGateway,
    options: RunAnalysisOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 3);
    this.now = options.now ?? (() => new Date());
  }

  async execute(url: string, type: AnalysisType, signal?: AbortSignal): Promise<AnalysisPayload> {
    if (!isValidHttpUrl(url)) {
      throw new ValidationError('Please enter a valid URL (e.g. https://example.com)', ErrorCodes.INVALID_URL);
    }
    if (!isAnalysisType(type)) {
      throw new ValidationError('Unknown analysis type', ErrorCodes.INVALID_ANALYSIS_TYPE);
    }

    const startedAt = Date.now();
    logger.info('Analysis started', { type, url });

    const payload = type === 'comprehensive'
      ? await this.runComprehensive(url, signal)
      : await this.gateway.run(type, url, signal);

    logger.info('Analysis finished', { type, url, durationMs: Date.now() - startedAt });
    return payload;
  }

  private async runComprehensive(url: string, signal?: AbortSignal): Promise<AnalysisPayload> {
    const limit = pLimit(this.concurrency);
    const results: SubAnalysisResults = {};
    const failures: SubAnalysisFailures = {};
    let firstError: unknown;

    await Promise.all(SINGLE_ANALYSIS_TYPES.map(subType => limit(async () => {
      try {
        results[subType] = await this.gateway.run(subType, url, signal);
      } catch (error: unknown) {
        firstError ??= error;
        failures[subType] = getErrorMessage(error);
        logger.warn('Sub-analysis failed', { type: subType, url, error: getErrorMessage(error) });
      }
    })));

    if (Object.keys(results).length === 0) {
      throw firstError ?? new AnalyzerError('Every analysis failed', undefined, ErrorCodes.ANALYSIS_FAILED);
    }

    return aggregateComprehensive(url, results, failures, this.now());
  }
}
