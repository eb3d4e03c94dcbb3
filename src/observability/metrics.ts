import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'client-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Transactions by kind and outcome (applied, limit_exceeded, invalid, not_found, failed)
 */
export const ledgerTransactionsTotal = new Counter({
  name: 'ledger_transactions_total',
  help: 'Ledger transactions by kind and outcome',
  labelNames: ['kind', 'outcome'] as const,
  registers: [registry],
});

export const ledgerTransactionAmount = new Histogram({
  name: 'ledger_transaction_amount_cents',
  help: 'Amounts of applied transactions in cents',
  labelNames: ['kind'] as const,
  buckets: [1, 10, 100, 1000, 10000, 100000, 1000000, 10000000],
  registers: [registry],
});

export const ledgerStatementsTotal = new Counter({
  name: 'ledger_statements_total',
  help: 'Statement reads by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

/**
 * Time spent inside the store's atomic unit (mutation or consistent read)
 */
export const ledgerAtomicUnitDuration = new Histogram({
  name: 'ledger_atomic_unit_duration_seconds',
  help: 'Duration of ledger store atomic units in seconds',
  labelNames: ['operation', 'store'] as const,
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
