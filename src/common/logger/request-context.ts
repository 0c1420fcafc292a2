import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContext {
  traceId: string;
  method?: string;
  path?: string;
  ip?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context (if available)
 */
export function getRequestContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the trace ID from the current request context
 */
export function getTraceId(): string | undefined {
  return asyncLocalStorage.getStore()?.traceId;
}
