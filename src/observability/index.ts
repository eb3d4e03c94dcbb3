// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
  runWithContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerTransactionsTotal,
  ledgerTransactionAmount,
  ledgerStatementsTotal,
  ledgerAtomicUnitDuration,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware, normalizePath } from './metrics.middleware';

// Tracing exports
export { initTracing, shutdownTracing, getTracer, traceLedgerOperation } from './tracing';
