import { Pool } from 'pg';

import { getLogger } from '@kernel/logger';
import type { EnvConfig } from '@config';

import type { AnalyzerGateway } from '../../domains/analysis/application/ports/AnalyzerGateway';
import type { ReportRepository } from '../../domains/analysis/application/ports/ReportRepository';
import { HttpAnalyzerGateway } from '../../domains/analysis/infra/analyzers/HttpAnalyzerGateway';
import { UnconfiguredAnalyzerGateway } from '../../domains/analysis/infra/analyzers/UnconfiguredAnalyzerGateway';
import { FileReportRepository } from '../../domains/analysis/infra/persistence/FileReportRepository';
import { PostgresReportRepository } from '../../domains/analysis/infra/persistence/PostgresReportRepository';

const logger = getLogger('container');

/**
* Dependency wiring for the web app
*/
export interface Container {
  gateway: AnalyzerGateway;
  repository: ReportRepository;
  /** Release pools and other held resources */
  close(): Promise<void>;
}

export type ContainerConfig = Pick<
  EnvConfig,
  | 'REPORT_STORE'
  | 'REPORTS_DIR'
  | 'DATABASE_URL'
  | 'ANALYZER_SERVICE_URL'
  | 'ANALYZER_TIMEOUT_MS'
  | 'ANALYZER_MAX_RETRIES'
  | 'REQUEST_TIMEOUT_MS'
>;

/**
* Per-attempt analyzer timeout, shortened so that every attempt of one call
* fits in the request budget.
*/
export function analyzerAttemptTimeoutMs(config: ContainerConfig): number {
  const attempts = config.ANALYZER_MAX_RETRIES + 1;
  return Math.max(1, Math.min(config.ANALYZER_TIMEOUT_MS, Math.floor(config.REQUEST_TIMEOUT_MS / attempts)));
}

export function createGateway(config: ContainerConfig): AnalyzerGateway {
  if (!config.ANALYZER_SERVICE_URL) {
    return new UnconfiguredAnalyzerGateway();
  }
  const timeoutMs = analyzerAttemptTimeoutMs(config);
  if (timeoutMs < config.ANALYZER_TIMEOUT_MS) {
    logger.warn('ANALYZER_TIMEOUT_MS shortened to fit REQUEST_TIMEOUT_MS', {
      configuredMs: config.ANALYZER_TIMEOUT_MS,
      attempts: config.ANALYZER_MAX_RETRIES + 1,
      timeoutMs,
    });
  }
  return new HttpAnalyzerGateway({
    baseUrl: config.ANALYZER_SERVICE_URL,
    timeoutMs,
    maxRetries: config.ANALYZER_MAX_RETRIES,
  });
}

export function createRepository(config: ContainerConfig): ReportRepository {
  if (config.REPORT_STORE === 'postgres') {
    if (!config.DATABASE_URL) {
      throw new Error('DATABASE_URL is required when REPORT_STORE=postgres');
    }
    const pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
    pool.on('error', (err) => {
      logger.error('Pool error', err);
    });
    return new PostgresReportRepository(pool);
  }
  return new FileReportRepository(config.REPORTS_DIR);
}

export function createContainer(config: ContainerConfig): Container {
  const gateway = createGateway(config);
  const repository = createRepository(config);
  logger.info('Container initialized', {
    reportStore: config.REPORT_STORE,
    analyzer: config.ANALYZER_SERVICE_URL ? 'http' : 'unconfigured',
  });

  return {
    gateway,
    repository,
    async close() {
      await repository.close?.();
    },
  };
}
