import fetch from 'node-fetch';

import { getLogger } from '@kernel/logger';
import { AbortError, isRetryableStatus, withRetry } from '@kernel/retry';
import { AnalyzerError, ErrorCodes, getErrorMessage, toError } from '@errors';

import { type AnalysisPayload, type SingleAnalysisType, isJsonObject } from '../../domain/analysisTypes';
import type { AnalyzerGateway } from '../../application/ports/AnalyzerGateway';

const logger = getLogger('analysis:http-gateway');

export interface HttpAnalyzerGatewayOptions {
  /** Base URL of the analysis service, without trailing slash */
  baseUrl: string;
  /** Upper bound for one attempt */
  timeoutMs?: number;
  /** Retries after the first attempt */
  maxRetries?: number;
  /** First backoff delay */
  initialDelayMs?: number;
}

/**
* Analyzer gateway reaching the external analysis service over HTTP.
*
* `POST {baseUrl}/analyses/{type}` with `{ url }`; the response body must be a
* JSON object. Network errors and 408/429/5xx answers are retried.
*/
export class HttpAnalyzerGateway implements AnalyzerGateway {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly initialDelayMs: number;

  constructor(options: HttpAnalyzerGatewayOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 90000;
    this.maxRetries = options.maxRetries ?? 2;
    this.initialDelayMs = options.initialDelayMs ?? 1000;
  }

  async run(type: SingleAnalysisType, url: string, signal?: AbortSignal): Promise<AnalysisPayload> {
    const startTime = Date.now();
    try {
      const payload = await withRetry(() => this.attempt(type, url, signal), {
        maxRetries: this.maxRetries,
        initialDelayMs: this.initialDelayMs,
        shouldRetry: isRetryableFailure,
        ...(signal && { signal }),
      });
      logger.debug('Analyzer responded', { type, url, durationMs: Date.now() - startTime });
      return payload;
    } catch (error: unknown) {
      logger.error('Analyzer call failed', toError(error), { type, url, durationMs: Date.now() - startTime });
      if (error instanceof AnalyzerError || error instanceof AbortError) {
        throw error;
      }
      throw new AnalyzerError(`Analysis service unreachable: ${getErrorMessage(error)}`, undefined, ErrorCodes.EXTERNAL_API_ERROR, toError(error));
    }
  }

  private async attempt(type: SingleAnalysisType, url: string, signal?: AbortSignal): Promise<AnalysisPayload> {
    if (signal?.aborted) {
      throw new AbortError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/analyses/${encodeURIComponent(type)}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'application/json',
        },
        body: JSON.stringify({ url }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new AnalyzerError(
          `Analysis service returned ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`,
          response.status
        );
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (error: unknown) {
        throw new AnalyzerError('Analysis service returned invalid JSON', response.status, ErrorCodes.EXTERNAL_API_ERROR, toError(error));
      }
      if (!isJsonObject(data)) {
        throw new AnalyzerError('Invalid response format from analysis service', response.status);
      }
      return data;
    } catch (error: unknown) {
      if (timedOut) {
        throw new AnalyzerError(`Analysis timed out after ${this.timeoutMs}ms`, undefined, ErrorCodes.TIMEOUT_ERROR);
      }
      if (signal?.aborted) {
        throw new AbortError();
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function isRetryableFailure(error: Error): boolean {
  if (error instanceof AnalyzerError) {
    if (error.code === ErrorCodes.TIMEOUT_ERROR) return true;
    return error.upstreamStatus !== undefined && isRetryableStatus(error.upstreamStatus);
  }
  // Network failures surface from node-fetch as FetchError
  return error.name === 'FetchError';
}
