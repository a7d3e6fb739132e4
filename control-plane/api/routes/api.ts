import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ErrorCodes } from '@errors';
import { errors } from '@errors/responses';
import { isValidHttpUrl, normalizeUrl } from '@utils/url';

import { DEFAULT_ANALYSIS_TYPE, isAnalysisType } from '../../../domains/analysis/domain/analysisTypes';
import { abortFailure, createRequestAbort } from '../request-abort';
import type { AnalysisHandlers, AnalysisRouteOptions } from '../types';

const AnalyzeBodySchema = z.object({
  url: z.string().trim().min(1),
  analysis_type: z.unknown().optional(),
});

/**
* JSON API. Analyses run here are returned directly and not stored.
*/
export async function apiRoutes(
  app: FastifyInstance,
  handlers: AnalysisHandlers,
  options: AnalysisRouteOptions
): Promise<void> {
  app.post('/api/analyze', async (req, reply) => {
    const bodyResult = AnalyzeBodySchema.safeParse(req.body ?? {});
    if (!bodyResult.success) {
      return errors.badRequest(reply, 'URL is required', ErrorCodes.REQUIRED_FIELD);
    }

    const { url, analysis_type: rawType } = bodyResult.data;
    const type = rawType === undefined || rawType === '' ? DEFAULT_ANALYSIS_TYPE : rawType;
    if (!isAnalysisType(type)) {
      return errors.badRequest(reply, 'Unknown analysis type', ErrorCodes.INVALID_ANALYSIS_TYPE);
    }
    if (!isValidHttpUrl(url)) {
      return errors.badRequest(reply, 'Please enter a valid URL (e.g. https://example.com)', ErrorCodes.INVALID_URL);
    }

    // Failures propagate to the global error handler
    const abort = createRequestAbort(reply.raw, options.requestTimeoutMs);
    try {
      const payload = await handlers.runAnalysis.execute(normalizeUrl(url), type, abort.signal);
      return reply.send(payload);
    } catch (error: unknown) {
      throw abortFailure(abort.signal, error);
    } finally {
      abort.dispose();
    }
  });

  app.get('/api/reports', async (_req, reply) => {
    const reports = await handlers.listReports.execute();
    return reply.send(reports);
  });
}
