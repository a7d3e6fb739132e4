import path from 'path';
import { fileURLToPath } from 'url';

import formbody from '@fastify/formbody';
import fastifyStatic from '@fastify/static';
import Fastify, { type FastifyInstance } from 'fastify';

import { getLogger } from '@kernel/logger';
import { AbortError } from '@kernel/retry';
import {
  BASE_SECURITY_HEADERS,
  CSP_API,
  CSP_WEB,
  HSTS_HEADER,
  PERMISSIONS_POLICY,
  type EnvConfig,
} from '@config';
import { AppError, ErrorCodes, sanitizeErrorForClient, toError } from '@errors';
import { getReplyRequestId, sendError } from '@errors/responses';

import type { AnalyzerGateway } from '../../domains/analysis/application/ports/AnalyzerGateway';
import type { ReportRepository } from '../../domains/analysis/application/ports/ReportRepository';
import { GetReport } from '../../domains/analysis/application/handlers/GetReport';
import { ListReports } from '../../domains/analysis/application/handlers/ListReports';
import { RunAnalysis } from '../../domains/analysis/application/handlers/RunAnalysis';
import { SaveReport } from '../../domains/analysis/application/handlers/SaveReport';
import { registerRequestLogger } from './middleware/request-logger';
import { apiRoutes } from './routes/api';
import { assetRoutes } from './routes/assets';
import { pageRoutes } from './routes/pages';
import type { AnalysisHandlers } from './types';

const logger = getLogger('http');

const STATIC_CSS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../apps/web/static/css');

export type AppConfig = Pick<EnvConfig, 'NODE_ENV' | 'REQUEST_TIMEOUT_MS' | 'ANALYSIS_CONCURRENCY'>;

export interface AppDependencies {
  gateway: AnalyzerGateway;
  repository: ReportRepository;
  config: AppConfig;
  /** Clock for report filenames and timestamps */
  now?: () => Date;
}

/**
* Fastify validation and parser errors carry a 4xx statusCode
*/
function clientStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) return undefined;
  const { statusCode } = error;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500 ? statusCode : undefined;
}

/**
* Build the web app: pages, JSON API, static assets and health check.
* Does not listen; server.ts does.
*/
export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { config } = deps;
  const production = config.NODE_ENV === 'production';
  const now = deps.now ?? (() => new Date());

  const app = Fastify({
    logger: false,
    bodyLimit: 1024 * 1024,
    requestTimeout: config.REQUEST_TIMEOUT_MS,
    connectionTimeout: 10000,
    trustProxy: true,
  });

  const handlers: AnalysisHandlers = {
    runAnalysis: new RunAnalysis(deps.gateway, { concurrency: config.ANALYSIS_CONCURRENCY, now }),
    saveReport: new SaveReport(deps.repository, now),
    getReport: new GetReport(deps.repository),
    listReports: new ListReports(deps.repository),
  };

  registerRequestLogger(app);

  await app.register(formbody);
  await app.register(fastifyStatic, {
    root: STATIC_CSS_DIR,
    prefix: '/static/css/',
    maxAge: production ? '1h' : 0,
  });

  app.addHook('onSend', async (_request, reply, payload) => {
    for (const [key, value] of Object.entries(BASE_SECURITY_HEADERS)) {
      void reply.header(key, value);
    }
    if (production) {
      void reply.header('Strict-Transport-Security', HSTS_HEADER);
    }
    const contentType = String(reply.getHeader('content-type') ?? '');
    void reply.header('Content-Security-Policy', contentType.startsWith('text/html') ? CSP_WEB : CSP_API);
    void reply.header('Permissions-Policy', PERMISSIONS_POLICY);
    return payload;
  });

  // Global error handler: { error, code, requestId, details? }
  app.setErrorHandler((error: unknown, _request, reply) => {
    const requestId = getReplyRequestId(reply);

    // The client is gone, nobody reads this response
    if (error instanceof AbortError) {
      logger.info('Request aborted', { requestId, reason: error.message });
      return reply.status(499).send();
    }

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error('Request failed', error, { code: error.code });
      }
      const { statusCode, body } = sanitizeErrorForClient(error, requestId);
      return reply.status(statusCode).send(body);
    }

    const clientStatus = clientStatusOf(error);
    if (clientStatus !== undefined) {
      return sendError(reply, clientStatus, ErrorCodes.VALIDATION_ERROR, toError(error).message);
    }

    logger.error('Unhandled route error', toError(error));
    const { statusCode, body } = sanitizeErrorForClient(error, requestId);
    return reply.status(statusCode).send(body);
  });

  app.setNotFoundHandler((_request, reply) => {
    return sendError(reply, 404, ErrorCodes.NOT_FOUND, 'Route not found');
  });

  app.get('/health', async () => ({ status: 'ok' }));

  const routeOptions = { requestTimeoutMs: config.REQUEST_TIMEOUT_MS };
  await pageRoutes(app, handlers, routeOptions);
  await apiRoutes(app, handlers, routeOptions);
  await assetRoutes(app, { production });

  return app;
}
