import { getRequestContext } from './request-context';
import { sanitizeForLogging } from './redaction';

/**
* Structured Logger
*
* JSON-per-line logging with service names, request correlation and
* pluggable handlers. Handlers receive the full entry; the default handler
* writes to stderr.
*/

// ============================================================================
// Type Definitions
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  service?: string | undefined;
  /** Request ID / Correlation ID */
  requestId?: string | undefined;
  /** Milliseconds since the request started */
  duration?: number | undefined;
  error?: Error | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export type LogHandler = (entry: LogEntry) => void;

export interface LoggerOptions {
  service: string;
  /** Correlation ID (overrides request context) */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

// ============================================================================
// Log Level Configuration
// ============================================================================

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

/**
* Read on every call so tests and late env changes take effect.
* 'silent' suppresses everything.
*/
function shouldLog(level: LogLevel): boolean {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel === 'silent') return false;
  const configured: LogLevel = isLogLevel(envLevel)
    ? envLevel
    : process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
  return LEVELS.indexOf(level) >= LEVELS.indexOf(configured);
}

// ============================================================================
// Handlers
// ============================================================================

/**
* Default handler. Everything goes to stderr so stdout stays free for
* anything that pipes the process output.
*/
function consoleHandler(entry: LogEntry): void {
  const { level, message, service, requestId, duration, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    time: entry.timestamp,
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput['service'] = service;
  if (requestId) logOutput['correlationId'] = requestId;
  if (duration !== undefined) logOutput['duration'] = duration;
  if (errorMessage) logOutput['error'] = errorMessage;
  if (errorStack && process.env['LOG_LEVEL'] === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) {
    logOutput['metadata'] = sanitizeForLogging(metadata);
  }

  process.stderr.write(`${JSON.stringify(logOutput)}\n`);
}

let handlers: LogHandler[] = [consoleHandler];

/**
* Add a log handler
* @returns Function to remove the handler
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the default one
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Restore the default stderr handler as the only handler
*/
export function resetLogHandlers(): void {
  handlers = [consoleHandler];
}

function dispatch(entry: LogEntry): void {
  for (const handler of [...handlers]) {
    handler(entry);
  }
}

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound service name and context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private createEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const requestContext = getRequestContext();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      requestId: this.correlationId ?? requestContext?.requestId,
      metadata: { ...this.context, ...metadata },
    };

    if (requestContext) entry.duration = Date.now() - requestContext.startTime;

    if (err) {
      entry.error = err;
      entry.errorMessage = err.message;
      entry.errorStack = err.stack;
    }

    return entry;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (shouldLog('debug')) dispatch(this.createEntry('debug', message, metadata));
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (shouldLog('info')) dispatch(this.createEntry('info', message, metadata));
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (shouldLog('warn')) dispatch(this.createEntry('warn', message, metadata));
  }

  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    if (shouldLog('error')) dispatch(this.createEntry('error', message, metadata, err));
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    if (shouldLog('fatal')) dispatch(this.createEntry('fatal', message, metadata, err));
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.service, this.correlationId, { ...this.context, ...additionalContext });
  }
}

/**
* Get logger for service
* @param serviceOrOptions - Service name or LoggerOptions object
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(
    serviceOrOptions.service,
    serviceOrOptions.correlationId,
    serviceOrOptions.context
  );
}
