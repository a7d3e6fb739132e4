import { EventEmitter } from 'events';

import { describe, it, expect, afterEach, vi } from 'vitest';

import { AbortError } from '@kernel/retry';
import { AnalyzerError, ErrorCodes } from '@errors';

import { abortFailure, createRequestAbort } from '../request-abort';

class FakeResponse extends EventEmitter {
  writableEnded = false;
}

describe('request abort', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('aborts when the client goes away before the response is written', () => {
    const response = new FakeResponse();
    const abort = createRequestAbort(response, 60000);

    response.emit('close');

    expect(abort.signal.aborted).toBe(true);
    expect(abort.signal.reason).toBeInstanceOf(AbortError);
    abort.dispose();
  });

  it('ignores the close that follows a written response', () => {
    const response = new FakeResponse();
    const abort = createRequestAbort(response, 60000);

    response.writableEnded = true;
    response.emit('close');

    expect(abort.signal.aborted).toBe(false);
    abort.dispose();
  });

  it('aborts with a timeout error once the budget is spent', () => {
    vi.useFakeTimers();
    const abort = createRequestAbort(new FakeResponse(), 500);

    vi.advanceTimersByTime(499);
    expect(abort.signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);

    expect(abort.signal.reason).toBeInstanceOf(AnalyzerError);
    expect(abort.signal.reason).toMatchObject({ statusCode: 504, message: 'Analysis did not finish within 500ms' });
    abort.dispose();
  });

  it('stops watching after dispose', () => {
    vi.useFakeTimers();
    const response = new FakeResponse();
    const abort = createRequestAbort(response, 500);

    abort.dispose();
    response.emit('close');
    vi.advanceTimersByTime(1000);

    expect(abort.signal.aborted).toBe(false);
    expect(response.listenerCount('close')).toBe(0);
  });

  it('prefers the abort reason over the error the aborted call threw', () => {
    const controller = new AbortController();
    const thrown = new AbortError();

    expect(abortFailure(controller.signal, thrown)).toBe(thrown);

    const reason = new AnalyzerError('Analysis did not finish within 5ms', undefined, ErrorCodes.TIMEOUT_ERROR);
    controller.abort(reason);
    expect(abortFailure(controller.signal, thrown)).toBe(reason);
  });
});
