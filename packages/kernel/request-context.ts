import { randomUUID } from 'crypto';

import { AsyncLocalStorage } from 'async_hooks';

/**
* Request Context Module
* Carries the request ID and timing through the async call chain of a request
* so that log entries written anywhere below a route share one correlation ID.
*/

export interface RequestContext {
  requestId: string;
  startTime: number;
  path?: string | undefined;
  method?: string | undefined;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
* Storage instance for request context
* Exported for the request logger hook, which enters the context for the rest
* of the request lifecycle.
*/
export const requestContextStorage = asyncLocalStorage;

/**
* Get current request context
* @returns Current request context or undefined if not in a context
*/
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
* Generate new request context
* @param options - Optional context properties to override defaults
*/
export function createRequestContext(options?: Partial<RequestContext>): RequestContext {
  return {
    requestId: options?.requestId || randomUUID(),
    startTime: options?.startTime ?? Date.now(),
    path: options?.path,
    method: options?.method,
  };
}
