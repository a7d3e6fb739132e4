/**
 * Environment Validation Schema
 *
 * Zod schema for every environment variable the web front end reads.
 * Defaults mirror the production launch settings: port 5000, two workers,
 * 120 second request timeout.
 *
 * @module @config/schema
 */

import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

export const envSchema = z.object({
  // -- Core --
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  SERVICE_NAME: z.string().min(2).regex(/^[a-zA-Z0-9_-]+$/, {
    message: 'SERVICE_NAME must contain only alphanumeric characters, hyphens, and underscores',
  }).default('seo-insight-web'),

  // -- HTTP server --
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: positiveInt.max(65535).default(5000),
  WEB_CONCURRENCY: positiveInt.max(64).default(2),
  REQUEST_TIMEOUT_MS: positiveInt.default(120000),

  // -- Report storage --
  REPORT_STORE: z.enum(['file', 'postgres']).default('file'),
  REPORTS_DIR: z.string().min(1).default('data/reports'),
  DATABASE_URL: z.string().min(1).optional(),

  // -- Analyzer service --
  ANALYZER_SERVICE_URL: z.string().url().optional(),
  ANALYZER_TIMEOUT_MS: positiveInt.default(90000),
  ANALYZER_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  ANALYSIS_CONCURRENCY: positiveInt.max(6).default(3),
}).superRefine((env, ctx) => {
  if (env.REPORT_STORE === 'postgres' && !env.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when REPORT_STORE=postgres',
    });
  }
});

export type EnvConfig = z.infer<typeof envSchema>;
