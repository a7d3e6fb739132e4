import crypto from 'crypto';

import type { FastifyInstance, FastifyRequest } from 'fastify';

import { getLogger } from '@kernel/logger';
import { createRequestContext, requestContextStorage } from '@kernel/request-context';

/**
* Adds request IDs and structured request logging
*/

const logger = getLogger('http');

export interface RequestLog {
  method: string;
  url: string;
  path: string;
  ip: string;
  userAgent?: string | undefined;
  duration: number;
  statusCode: number;
}

function generateRequestId(): string {
  return `${Date.now()}-${crypto.randomBytes(8).toString('hex')}`;
}

/**
 * Client-supplied X-Request-ID values are only kept when they are bounded
 * alphanumeric-dash strings; anything else is replaced by a fresh ID.
 */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

export function sanitizeRequestId(raw: string | string[] | undefined): string | undefined {
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (!value) return undefined;
  return SAFE_REQUEST_ID_RE.test(value) ? value : undefined;
}

function getClientIP(req: FastifyRequest): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string') {
    const ips = forwarded.split(',').map(s => s.trim()).filter(Boolean);
    return ips[0] || req.ip;
  }
  return req.ip;
}

/**
* Register the request logger hooks on an app.
*
* The request context is entered in onRequest so every log entry written while
* handling the request carries its ID.
*/
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook('onRequest', async (req, reply) => {
    const requestId = sanitizeRequestId(req.headers['x-request-id']) ?? generateRequestId();
    requestContextStorage.enterWith(createRequestContext({
      requestId,
      path: req.url.split('?')[0],
      method: req.method,
    }));
    void reply.header('X-Request-ID', requestId);
  });

  app.addHook('onResponse', async (req, reply) => {
    const entry: RequestLog = {
      method: req.method,
      url: req.url,
      path: req.routeOptions.url ?? req.url.split('?')[0] ?? req.url,
      ip: getClientIP(req),
      userAgent: req.headers['user-agent'],
      duration: Math.round(reply.elapsedTime),
      statusCode: reply.statusCode,
    };
    const message = `${entry.method} ${entry.path} ${entry.statusCode}`;
    if (entry.statusCode >= 500) {
      logger.error(message, undefined, { ...entry });
    } else if (entry.statusCode >= 400) {
      logger.warn(message, { ...entry });
    } else {
      logger.info(message, { ...entry });
    }
  });
}
