/**
 * Error hierarchy, status mapping and client sanitization
 */

import { describe, it, expect, afterEach } from 'vitest';

import {
  AnalyzerError,
  AppError,
  ErrorCodes,
  NotFoundError,
  ServiceUnavailableError,
  StorageError,
  ValidationError,
  getErrorMessage,
  sanitizeErrorForClient,
  shouldExposeErrorDetails,
  toError,
} from '../index';

describe('Error Handling Package', () => {
  const originalEnv = process.env['NODE_ENV'];

  afterEach(() => {
    process.env['NODE_ENV'] = originalEnv;
  });

  // ============================================================================
  // Error classes
  // ============================================================================

  describe('AppError', () => {
    it('defaults to an internal 500', () => {
      const error = new AppError('Something broke');

      expect(error.statusCode).toBe(500);
      expect(error.code).toBe(ErrorCodes.INTERNAL_ERROR);
      expect(error.name).toBe('AppError');
      expect(error).toBeInstanceOf(Error);
    });

    it('keeps the cause', () => {
      const cause = new Error('root');
      const error = new AppError('wrapped', ErrorCodes.INTERNAL_ERROR, 500, undefined, { cause });

      expect(error.cause).toBe(cause);
    });

    it('serializes details only in development for clients', () => {
      const error = new ValidationError('Bad input', ErrorCodes.VALIDATION_ERROR, { field: 'url' });

      expect(error.toJSON()).toEqual({ error: 'Bad input', code: 'VALIDATION_ERROR', details: { field: 'url' } });

      process.env['NODE_ENV'] = 'production';
      expect(error.toClientJSON('req-1')).toEqual({ error: 'Bad input', code: 'VALIDATION_ERROR', requestId: 'req-1' });

      process.env['NODE_ENV'] = 'development';
      expect(error.toClientJSON()).toEqual({ error: 'Bad input', code: 'VALIDATION_ERROR', details: { field: 'url' } });
    });
  });

  describe('status mapping', () => {
    it('maps each class to its HTTP status', () => {
      expect(new ValidationError().statusCode).toBe(400);
      expect(new NotFoundError().statusCode).toBe(404);
      expect(new ServiceUnavailableError().statusCode).toBe(503);
      expect(new StorageError('disk full').statusCode).toBe(500);
    });

    it('names missing reports', () => {
      const error = NotFoundError.report();

      expect(error.message).toBe('Report not found');
      expect(error.code).toBe(ErrorCodes.REPORT_NOT_FOUND);
    });

    it('maps analyzer timeouts to 504 and other analyzer failures to 502', () => {
      expect(new AnalyzerError('Analysis timed out after 90000ms', undefined, ErrorCodes.TIMEOUT_ERROR).statusCode).toBe(504);

      const upstream = new AnalyzerError('Analysis service returned 503', 503);
      expect(upstream.statusCode).toBe(502);
      expect(upstream.upstreamStatus).toBe(503);
      expect(upstream.code).toBe(ErrorCodes.EXTERNAL_API_ERROR);
    });

    it('defaults storage errors to STORAGE_ERROR', () => {
      expect(new StorageError('disk full').code).toBe('STORAGE_ERROR');
      expect(new StorageError('pool closed', ErrorCodes.DATABASE_ERROR).code).toBe('DATABASE_ERROR');
    });
  });

  // ============================================================================
  // Helpers
  // ============================================================================

  describe('sanitizeErrorForClient', () => {
    it('passes AppErrors through with their status', () => {
      const result = sanitizeErrorForClient(NotFoundError.report(), 'req-9');

      expect(result).toEqual({
        statusCode: 404,
        body: { error: 'Report not found', code: 'REPORT_NOT_FOUND', requestId: 'req-9' },
      });
    });

    it('hides the message of anything else', () => {
      const result = sanitizeErrorForClient(new Error('password=test-secret'));

      expect(result).toEqual({
        statusCode: 500,
        body: { error: 'An error occurred processing your request', code: 'INTERNAL_ERROR' },
      });
    });
  });

  describe('shouldExposeErrorDetails', () => {
    it('is only true in development', () => {
      process.env['NODE_ENV'] = 'development';
      expect(shouldExposeErrorDetails()).toBe(true);
      process.env['NODE_ENV'] = 'test';
      expect(shouldExposeErrorDetails()).toBe(false);
    });
  });

  describe('toError and getErrorMessage', () => {
    it('normalizes thrown values', () => {
      const error = new Error('x');

      expect(toError(error)).toBe(error);
      expect(toError('plain').message).toBe('plain');
      expect(getErrorMessage(42)).toBe('42');
      expect(getErrorMessage(new Error('y'))).toBe('y');
    });
  });
});
