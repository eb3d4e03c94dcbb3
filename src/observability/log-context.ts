import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped context carried through every await of a request
 */
export interface LogContext {
  correlationId: string;
  clientId?: number;
  operation?: 'transaction' | 'statement';
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Merge fields into the active context; no-op outside a request
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
