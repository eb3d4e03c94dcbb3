/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, LEDGER_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const uri = MONGODB_URI;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/ledger?replicaSet=rs0'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/ledger-test?replicaSet=rs0'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/ledger?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// LEDGER CONFIGURATION
// =============================================================================

export type LedgerStoreKind = 'mongo' | 'memory';

export interface ProvisionedClientConfig {
  id: number;
  limit: number;
}

/**
 * Reference provisioning table. Client 6 is intentionally absent.
 */
export const DEFAULT_PROVISIONED_CLIENTS: ProvisionedClientConfig[] = [
  { id: 1, limit: 100000 },
  { id: 2, limit: 80000 },
  { id: 3, limit: 1000000 },
  { id: 4, limit: 10000000 },
  { id: 5, limit: 500000 },
];

const isProvisionedClientConfig = (value: unknown): value is ProvisionedClientConfig => {
  if (typeof value !== 'object' || value === null) return false;
  if (!('id' in value) || !('limit' in value)) return false;
  const { id, limit } = value;
  return (
    typeof id === 'number' &&
    Number.isSafeInteger(id) &&
    id > 0 &&
    typeof limit === 'number' &&
    Number.isSafeInteger(limit) &&
    limit >= 0
  );
};

/**
 * Parse PROVISIONED_CLIENTS, a JSON array of { id, limit } objects.
 * Throws on malformed input so a bad deployment fails at startup.
 */
export const parseProvisionedClients = (raw: string | undefined): ProvisionedClientConfig[] => {
  if (!raw) return DEFAULT_PROVISIONED_CLIENTS;

  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed) || !parsed.every(isProvisionedClientConfig)) {
    throw new Error('PROVISIONED_CLIENTS must be a JSON array of { id, limit } with integer values');
  }

  const ids = new Set(parsed.map((client) => client.id));
  if (ids.size !== parsed.length) {
    throw new Error('PROVISIONED_CLIENTS contains duplicate client ids');
  }

  return parsed;
};

const parseStoreKind = (raw: string | undefined): LedgerStoreKind => {
  const value = raw || (isTest ? 'memory' : 'mongo');
  if (value !== 'mongo' && value !== 'memory') {
    throw new Error(`LEDGER_STORE must be 'mongo' or 'memory', got '${value}'`);
  }
  return value;
};

/**
 * Ledger store selection and provisioning
 *
 * The in-memory store keeps state per process: run a single process when
 * using it. The mongo store requires a replica set for multi-document
 * transactions.
 */
export const LEDGER_CONFIG = {
  store: parseStoreKind(process.env.LEDGER_STORE),
  provisionedClients: parseProvisionedClients(process.env.PROVISIONED_CLIENTS),
  statementSize: 10,
  // Append-only journal that makes the memory store survive restarts
  journalPath: process.env.LEDGER_JOURNAL_PATH || undefined,
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

/**
 * API configuration
 */
export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

/**
 * Logging configuration by environment
 */
export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

/**
 * OpenTelemetry configuration
 */
export const OTEL_CONFIG = {
  enabled: !isTest && (isProduction || process.env.OTEL_ENABLED === 'true'),
  serviceName: process.env.OTEL_SERVICE_NAME || 'client-ledger',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = LEDGER_CONFIG.store === 'mongo' ? ['MONGODB_URI'] : [];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  ledgerStore: LEDGER_CONFIG.store,
  provisionedClients: LEDGER_CONFIG.provisionedClients.length,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
});
