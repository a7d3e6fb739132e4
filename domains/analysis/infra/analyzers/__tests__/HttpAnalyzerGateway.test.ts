import { describe, it, expect, beforeEach, vi } from 'vitest';
import fetch, { FetchError, Response } from 'node-fetch';

import { AbortError } from '@kernel/retry';
import { AnalyzerError, ErrorCodes, ServiceUnavailableError } from '@errors';

import { HttpAnalyzerGateway } from '../HttpAnalyzerGateway';
import { UnconfiguredAnalyzerGateway } from '../UnconfiguredAnalyzerGateway';

vi.mock('node-fetch', async () => {
  const actual = await vi.importActual<typeof import('node-fetch')>('node-fetch');
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createGateway(overrides: { maxRetries?: number; timeoutMs?: number } = {}): HttpAnalyzerGateway {
  return new HttpAnalyzerGateway({
    baseUrl: 'http://analyzer.test/',
    maxRetries: overrides.maxRetries ?? 2,
    timeoutMs: overrides.timeoutMs ?? 1000,
    initialDelayMs: 1,
  });
}

describe('HttpAnalyzerGateway', () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it('posts the URL to the type endpoint and returns the JSON object', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ score: 81, domain: 'example.com' }));

    const result = await createGateway().run('seo', 'https://example.com/');

    expect(result).toEqual({ score: 81, domain: 'example.com' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://analyzer.test/analyses/seo');
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({
      method: 'POST',
      body: '{"url":"https://example.com/"}',
    });
  });

  it('does not retry client errors', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad url', { status: 400 }));

    const error = await createGateway().run('mobile', 'https://example.com/').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnalyzerError);
    expect(error).toMatchObject({
      message: 'Analysis service returned 400: bad url',
      upstreamStatus: 400,
      statusCode: 502,
      code: ErrorCodes.EXTERNAL_API_ERROR,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries retryable statuses', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('', { status: 503 }))
      .mockResolvedValueOnce(jsonResponse({ page_speed_score: 64 }));

    const result = await createGateway().run('pagespeed', 'https://example.com/');

    expect(result).toEqual({ page_speed_score: 64 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('rejects bodies that are not JSON objects', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([1, 2, 3]));

    await expect(createGateway().run('ad', 'https://example.com/')).rejects.toMatchObject({
      message: 'Invalid response format from analysis service',
      statusCode: 502,
    });
  });

  it('wraps network failures after the last retry', async () => {
    fetchMock.mockRejectedValue(new FetchError('request to http://analyzer.test/analyses/seo failed, reason: connect ECONNREFUSED', 'system'));

    const error = await createGateway({ maxRetries: 1 }).run('seo', 'https://example.com/').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AnalyzerError);
    expect(error instanceof Error ? error.message : '').toMatch(/^Analysis service unreachable: /);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('times out slow responses', async () => {
    fetchMock.mockImplementation((_url, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted.')));
    }));

    await expect(createGateway({ maxRetries: 0, timeoutMs: 20 }).run('analytics', 'https://example.com/')).rejects.toMatchObject({
      message: 'Analysis timed out after 20ms',
      code: ErrorCodes.TIMEOUT_ERROR,
      statusCode: 504,
    });
  });

  it('does not call the service once the caller has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createGateway().run('seo', 'https://example.com/', controller.signal)).rejects.toBeInstanceOf(AbortError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('UnconfiguredAnalyzerGateway', () => {
  it('fails every run with 503', async () => {
    const error = await new UnconfiguredAnalyzerGateway().run('seo', 'https://example.com/').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceUnavailableError);
    expect(error).toMatchObject({ statusCode: 503, message: 'Analysis service is not configured' });
  });
});
