import type { FastifyInstance, FastifyReply } from 'fastify';
import React from 'react';
import { z } from 'zod';

import { getLogger } from '@kernel/logger';
import { AbortError } from '@kernel/retry';
import { AppError, ErrorCodes, NotFoundError, toError } from '@errors';
import { errors } from '@errors/responses';
import { isValidHttpUrl, normalizeUrl } from '@utils/url';

import {
  DEFAULT_ANALYSIS_TYPE,
  type AnalysisType,
  isAnalysisType,
} from '../../../domains/analysis/domain/analysisTypes';
import { formatTimestamp } from '../../../domains/analysis/domain/reportFilename';
import { IndexPage, type IndexPageProps } from '../../../apps/web/components/IndexPage';
import { ResultPage } from '../../../apps/web/components/ResultPage';
import { renderPage } from '../../../apps/web/lib/render';
import { getTools } from '../../../apps/web/lib/tools';
import { abortFailure, createRequestAbort } from '../request-abort';
import type { AnalysisHandlers, AnalysisRouteOptions } from '../types';

const logger = getLogger('page-routes');

const RECENT_REPORT_LIMIT = 10;

export const FORM_MESSAGES = {
  emptyUrl: 'Please enter a URL',
  invalidUrl: 'Please enter a valid URL (e.g. https://example.com)',
  unknownType: 'Unknown analysis type',
  reportNotFound: 'Report not found',
  internal: 'An error occurred processing your request',
} as const;

// A field sent more than once keeps its first value
const FormField = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(value => (Array.isArray(value) ? value[0] : value));

const AnalyzeFormSchema = z.object({
  url: FormField,
  analysis_type: FormField,
});

const FilenameParamsSchema = z.object({
  filename: z.string(),
});

/**
* Server-rendered pages: the form, the analyze action, stored results and
* report downloads.
*/
export async function pageRoutes(
  app: FastifyInstance,
  handlers: AnalysisHandlers,
  options: AnalysisRouteOptions
): Promise<void> {
  async function sendIndex(
    reply: FastifyReply,
    statusCode: number,
    props: Omit<IndexPageProps, 'tools' | 'recentReports'> = {}
  ): Promise<FastifyReply> {
    let recentReports: IndexPageProps['recentReports'] = [];
    try {
      recentReports = (await handlers.listReports.execute()).slice(0, RECENT_REPORT_LIMIT);
    } catch (error: unknown) {
      logger.warn('Could not list recent reports', { error: toError(error).message });
    }
    const html = renderPage(React.createElement(IndexPage, { ...props, tools: getTools(), recentReports }));
    return reply.status(statusCode).type('text/html; charset=utf-8').send(html);
  }

  app.get('/', async (_req, reply) => sendIndex(reply, 200));

  app.post('/analyze', async (req, reply) => {
    const parsed = AnalyzeFormSchema.safeParse(req.body ?? {});
    const form = parsed.success ? parsed.data : {};
    const url = (form.url ?? '').trim();
    const rawType = form.analysis_type?.trim() || DEFAULT_ANALYSIS_TYPE;
    const selectedType: AnalysisType = isAnalysisType(rawType) ? rawType : DEFAULT_ANALYSIS_TYPE;

    if (!url) {
      return sendIndex(reply, 400, { error: FORM_MESSAGES.emptyUrl, selectedType });
    }
    if (!isAnalysisType(rawType)) {
      return sendIndex(reply, 400, { error: FORM_MESSAGES.unknownType, url });
    }
    if (!isValidHttpUrl(url)) {
      return sendIndex(reply, 400, { error: FORM_MESSAGES.invalidUrl, url, selectedType });
    }

    const abort = createRequestAbort(reply.raw, options.requestTimeoutMs);
    try {
      const target = normalizeUrl(url);
      const payload = await handlers.runAnalysis.execute(target, rawType, abort.signal);
      // Nobody is waiting for a report that finished too late
      if (abort.signal.aborted) {
        throw abortFailure(abort.signal, new AbortError());
      }
      const report = await handlers.saveReport.execute(rawType, target, payload);
      return reply.redirect(`/result/${encodeURIComponent(report.filename)}`, 303);
    } catch (caught: unknown) {
      const error = abortFailure(abort.signal, caught);
      if (error instanceof AbortError) {
        logger.info('Client left before the analysis finished', { type: rawType, url });
        return reply.status(499).send();
      }
      if (error instanceof AppError) {
        logger.warn('Analysis request failed', { type: rawType, url, code: error.code, error: error.message });
        return sendIndex(reply, error.statusCode, { error: error.message, url, selectedType });
      }
      logger.error('Analysis request failed', toError(error), { type: rawType, url });
      return sendIndex(reply, 500, { error: FORM_MESSAGES.internal, url, selectedType });
    } finally {
      abort.dispose();
    }
  });

  app.get('/result/:filename', async (req, reply) => {
    const { filename } = FilenameParamsSchema.parse(req.params);
    try {
      const report = await handlers.getReport.execute(filename);
      const html = renderPage(React.createElement(ResultPage, {
        filename: report.filename,
        type: report.type,
        url: report.url,
        createdAt: formatTimestamp(report.createdAt),
        payload: report.payload,
      }));
      return reply.type('text/html; charset=utf-8').send(html);
    } catch (error: unknown) {
      if (error instanceof NotFoundError) {
        return sendIndex(reply, 404, { error: FORM_MESSAGES.reportNotFound });
      }
      throw error;
    }
  });

  app.get('/download/:filename', async (req, reply) => {
    const { filename } = FilenameParamsSchema.parse(req.params);
    try {
      const report = await handlers.getReport.execute(filename);
      return reply
        .header('Content-Disposition', `attachment; filename="${report.filename}"`)
        .type('application/json; charset=utf-8')
        .send(report.serialize());
    } catch (error: unknown) {
      if (error instanceof NotFoundError) {
        return errors.notFound(reply, 'Report', ErrorCodes.REPORT_NOT_FOUND);
      }
      throw error;
    }
  });
}
