import { AbortError } from '@kernel/retry';
import { AnalyzerError, ErrorCodes } from '@errors';

/** The part of the raw response the signal watches */
export interface ClosableResponse {
  readonly writableEnded: boolean;
  once(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

export interface RequestAbort {
  signal: AbortSignal;
  /** Stop the timer and detach from the response */
  dispose(): void;
}

/**
* Abort signal for analyzer work done on behalf of one request. It fires with
* an `AbortError` when the client goes away before the response is written,
* and with a timeout `AnalyzerError` once the request has run for `timeoutMs`.
*/
export function createRequestAbort(response: ClosableResponse, timeoutMs: number): RequestAbort {
  const controller = new AbortController();

  const onClose = () => {
    if (!response.writableEnded) {
      controller.abort(new AbortError('Client closed the request'));
    }
  };
  const timeoutId = setTimeout(() => {
    controller.abort(new AnalyzerError(
      `Analysis did not finish within ${timeoutMs}ms`,
      undefined,
      ErrorCodes.TIMEOUT_ERROR
    ));
  }, timeoutMs);

  response.once('close', onClose);

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timeoutId);
      response.off('close', onClose);
    },
  };
}

/**
* Once the signal has fired, its reason explains the failure better than
* whatever the aborted call threw.
*/
export function abortFailure(signal: AbortSignal, error: unknown): unknown {
  const reason: unknown = signal.reason;
  return signal.aborted && reason instanceof Error ? reason : error;
}
