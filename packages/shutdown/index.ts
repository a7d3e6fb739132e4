import { getLogger } from '@kernel/logger';
import { withTimeout } from '@kernel/retry';
import { parseIntEnv } from '@config/env';

/**
* Centralized Shutdown Manager
*
* One place for SIGTERM/SIGINT handling. The HTTP server, the report store
* and anything else holding resources registers a handler here.
*/

const logger = getLogger({ service: 'shutdown' });

export type ShutdownHandler = () => Promise<void> | void;

const handlers: Set<ShutdownHandler> = new Set();

let isShuttingDown = false;

// ============================================================================
// Handler Management
// ============================================================================

/**
* Register a shutdown handler to be called during graceful shutdown
* @returns Function to unregister the handler
*/
export function registerShutdownHandler(handler: ShutdownHandler): () => void {
  handlers.add(handler);
  return () => handlers.delete(handler);
}

export function clearShutdownHandlers(): void {
  handlers.clear();
}

export function getHandlerCount(): number {
  return handlers.size;
}

// ============================================================================
// Shutdown Execution
// ============================================================================

/**
* Run every registered handler with error isolation and a per-handler timeout.
* @returns Number of handlers that failed or timed out
*/
export async function runShutdownHandlers(
  handlerTimeoutMs = parseIntEnv('SHUTDOWN_HANDLER_TIMEOUT_MS', 30000)
): Promise<number> {
  const results = await Promise.allSettled(
    Array.from(handlers).map(async (handler, index) => {
      const handlerName = handler.name || `handler-${index}`;
      try {
        await withTimeout(Promise.resolve(handler()), handlerTimeoutMs);
        logger.info(`Shutdown handler ${handlerName} completed`);
      } catch (err) {
        logger.error(`Shutdown handler ${handlerName} failed`, err instanceof Error ? err : new Error(String(err)));
        throw err;
      }
    })
  );
  return results.filter(r => r.status === 'rejected').length;
}

/**
* Execute graceful shutdown and exit the process
* @param signal - The signal that triggered the shutdown
* @param exitCode - Exit code to use when every handler succeeded
*/
export async function gracefulShutdown(signal: string, exitCode = 0): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}, starting graceful shutdown`);

  const failures = await runShutdownHandlers();
  if (failures > 0) {
    logger.error(`${failures} shutdown handlers failed`);
  }
  process.exit(failures > 0 ? 1 : exitCode);
}

export function getIsShuttingDown(): boolean {
  return isShuttingDown;
}

export function resetShutdownState(): void {
  isShuttingDown = false;
}

// ============================================================================
// Global Handler Setup
// ============================================================================

let isRegistered = false;

/**
* Setup global shutdown handlers (SIGTERM/SIGINT).
* Safe to call multiple times.
*/
export function setupShutdownHandlers(): void {
  if (isRegistered) return;
  isRegistered = true;

  const onSignal = (signal: NodeJS.Signals) => {
    gracefulShutdown(signal).catch((error: unknown) => {
      logger.fatal(`${signal} shutdown error`, error instanceof Error ? error : new Error(String(error)));
      process.exit(1);
    });
  };

  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}
