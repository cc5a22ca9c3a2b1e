import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped fields merged into every log line. A transfer adds its id
 * and entity once it is journaled, so rail and persistence logs can be tied
 * back to it.
 */
export interface LogContext {
  correlationId: string;
  callerId?: string;
  transferId?: string;
  entity?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

/**
 * Get the current correlation ID from the async context
 */
export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

/**
 * Get the current log context
 */
export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Add additional context to the current log context
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};
