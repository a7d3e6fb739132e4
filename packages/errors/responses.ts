/**
 * Standardized API response helpers.
 *
 * Every JSON error response has the shape
 * { error: string, code: string, requestId: string, details?: unknown }
 */

import type { FastifyReply } from 'fastify';
import { ErrorCodes, type ErrorCode, type ErrorResponse, shouldExposeErrorDetails } from './index';

/**
 * Send a standardized error response.
 * The request ID comes from the X-Request-ID response header set by the
 * request logger, falling back to the incoming header.
 */
export function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: ErrorCode,
  message: string,
  opts?: { details?: unknown }
): FastifyReply {
  const body: ErrorResponse = {
    error: message,
    code,
    requestId: getReplyRequestId(reply),
  };
  if (opts?.details !== undefined && shouldExposeErrorDetails()) {
    body.details = opts.details;
  }
  return reply.status(statusCode).send(body);
}

export function getReplyRequestId(reply: FastifyReply): string {
  const fromReply = reply.getHeader('x-request-id');
  if (typeof fromReply === 'string') return fromReply;
  const raw = reply.request.headers['x-request-id'];
  return (typeof raw === 'string' ? raw : Array.isArray(raw) ? raw[0] : undefined) ?? '';
}

/** Convenience helpers for common error responses. */
export const errors = {
  badRequest: (reply: FastifyReply, msg = 'Bad request', code: ErrorCode = ErrorCodes.VALIDATION_ERROR, details?: unknown) =>
    sendError(reply, 400, code, msg, { details }),

  notFound: (reply: FastifyReply, resource = 'Resource', code: ErrorCode = ErrorCodes.NOT_FOUND) =>
    sendError(reply, 404, code, `${resource} not found`),

  validationFailed: (reply: FastifyReply, details?: unknown) =>
    sendError(reply, 400, ErrorCodes.VALIDATION_ERROR, 'Validation failed', { details }),

  internal: (reply: FastifyReply, msg = 'An error occurred processing your request') =>
    sendError(reply, 500, ErrorCodes.INTERNAL_ERROR, msg),

  serviceUnavailable: (reply: FastifyReply, msg = 'Service temporarily unavailable') =>
    sendError(reply, 503, ErrorCodes.SERVICE_UNAVAILABLE, msg),
} as const;
