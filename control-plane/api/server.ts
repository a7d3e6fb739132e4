import cluster, { type Worker } from 'cluster';

import { getLogger } from '@kernel/logger';
import { validateEnv, type EnvConfig } from '@config';
import { toError } from '@errors';
import { getIsShuttingDown, gracefulShutdown, registerShutdownHandler, setupShutdownHandlers } from '@shutdown';

import { createContainer } from '../services/container';
import { buildApp } from './http';
import { WorkerRestartPolicy } from './restart-policy';

/**
* Process entry point. The primary forks WEB_CONCURRENCY workers and
* replaces any that exit unexpectedly, backing off on workers that die at
* startup; each worker serves the app on the shared HOST:PORT.
*/

const logger = getLogger('server');

function startPrimary(config: EnvConfig): void {
  logger.info(`Primary ${process.pid} starting ${config.WEB_CONCURRENCY} workers`);

  const restartPolicy = new WorkerRestartPolicy();
  const forkedAt = new Map<number, number>();
  const fork = () => {
    const worker = cluster.fork();
    forkedAt.set(worker.id, Date.now());
  };

  for (let i = 0; i < config.WEB_CONCURRENCY; i++) {
    fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    const uptimeMs = Date.now() - (forkedAt.get(worker.id) ?? Date.now());
    forkedAt.delete(worker.id);
    if (getIsShuttingDown()) return;

    const decision = restartPolicy.onExit(uptimeMs);
    if (!decision.restart) {
      logger.fatal('Workers keep exiting at startup, stopping', undefined, {
        pid: worker.process.pid, code, signal, rapidExits: decision.rapidExits,
      });
      gracefulShutdown('worker-restart-limit', 1).catch((error: unknown) => {
        logger.fatal('Shutdown error', toError(error));
        process.exit(1);
      });
      return;
    }
    logger.warn('Worker exited, starting a replacement', {
      pid: worker.process.pid, code, signal, uptimeMs, delayMs: decision.delayMs,
    });
    setTimeout(fork, decision.delayMs);
  });

  registerShutdownHandler(async function stopWorkers() {
    const workers = Object.values(cluster.workers ?? {}).filter((w): w is Worker => w !== undefined);
    await Promise.all(workers.map(worker => new Promise<void>(resolve => {
      worker.once('exit', () => resolve());
      worker.process.kill('SIGTERM');
    })));
  });

  setupShutdownHandlers();
}

async function startWorker(config: EnvConfig): Promise<void> {
  const container = createContainer(config);
  const app = await buildApp({
    gateway: container.gateway,
    repository: container.repository,
    config,
  });

  registerShutdownHandler(async function closeHttpServer() {
    await app.close();
  });
  registerShutdownHandler(async function closeContainer() {
    await container.close();
  });
  setupShutdownHandlers();

  await app.listen({ host: config.HOST, port: config.PORT });
  logger.info(`Worker ${process.pid} listening on ${config.HOST}:${config.PORT}`);
}

function main(): void {
  let config: EnvConfig;
  try {
    config = validateEnv();
  } catch (error: unknown) {
    // Logger output may be filtered by an invalid LOG_LEVEL, stderr is not
    process.stderr.write(`[startup] Environment validation failed: ${toError(error).message}\n`);
    process.exit(1);
  }

  if (cluster.isPrimary && config.WEB_CONCURRENCY > 1) {
    startPrimary(config);
    return;
  }

  startWorker(config).catch((error: unknown) => {
    logger.fatal('Failed to start server', toError(error));
    process.exit(1);
  });
}

main();
