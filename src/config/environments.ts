/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, RAIL_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const fee = RAIL_CONFIG.transferFee;
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

export type PersistenceMode = 'mongo' | 'memory';

/**
 * Where custody snapshots are kept. Tests always run against memory.
 */
export const PERSISTENCE_MODE: PersistenceMode = isTest
  ? 'memory'
  : process.env.PERSISTENCE === 'memory'
  ? 'memory'
  : 'mongo';

/**
 * MongoDB URI by environment
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/campaign-custody'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/campaign-custody-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/campaign-custody';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 20 : 5,
  minPoolSize: isProduction ? 2 : 1,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

/**
 * Redis backs rate limits and idempotent replay only; custody state never
 * lives there, so the service runs on without it.
 */
export const REDIS_CONFIG = {
  host: process.env.REDIS_HOST || (isProduction ? 'redis' : 'localhost'),
  port: parseInt(process.env.REDIS_PORT || (isTest ? '6380' : '6379'), 10),
  password: isProduction ? process.env.REDIS_PASSWORD || undefined : undefined,
  connectTimeoutMs: parseInt(process.env.REDIS_CONNECT_TIMEOUT_MS || '2000', 10),
  maxReconnectAttempts: parseInt(process.env.REDIS_MAX_RECONNECT_ATTEMPTS || '3', 10),
};

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT verification settings. Tokens are issued elsewhere; this service only
 * verifies them and reads the caller identity from the `sub` claim.
 */
export const JWT_CONFIG = {
  secret: process.env.JWT_SECRET || (isTest ? 'test-secret' : 'dev-secret-do-not-use-in-production'),
  issuer: process.env.JWT_ISSUER || undefined,
  audience: process.env.JWT_AUDIENCE || undefined,
};

// =============================================================================
// PAYMENT RAIL CONFIGURATION
// =============================================================================

export type RailMode = 'http' | 'simulated';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * RAIL_TRANSFER_FEE in smallest units. Checked when the config loads, so a
 * bad value stops startup before any transfer is attempted.
 */
export const parseTransferFee = (raw: string | undefined): bigint => {
  const value = raw === undefined || raw === '' ? '10000' : raw.trim();
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(
      `RAIL_TRANSFER_FEE must be a non-negative integer in the smallest unit, got "${raw}"`
    );
  }
  return BigInt(value);
};

const railMode = (): RailMode => {
  if (process.env.RAIL_MODE === 'http') return 'http';
  if (process.env.RAIL_MODE === 'simulated') return 'simulated';
  return isProduction ? 'http' : 'simulated';
};

/**
 * External ledger (rail) settings
 *
 * The fee is fixed in smallest units and netted out of the moved amount by the rail.
 */
export const RAIL_CONFIG = {
  mode: railMode(),
  url: process.env.RAIL_URL || 'http://localhost:8080',
  transferFee: parseTransferFee(process.env.RAIL_TRANSFER_FEE),
  timeoutMs: parseInt(process.env.RAIL_TIMEOUT_MS || (isTest ? '200' : '30000'), 10),
  custodyAccount: {
    owner: process.env.CUSTODY_ACCOUNT_OWNER || 'custody',
    subaccount: process.env.CUSTODY_SUBACCOUNT || undefined,
  },
};

// =============================================================================
// STORAGE CONFIGURATION
// =============================================================================

/**
 * Key-value store bounds. A value whose encoding exceeds the bound is refused.
 */
export const STORAGE_CONFIG = {
  maxValueBytes: parseInt(process.env.STORAGE_MAX_VALUE_BYTES || '1024', 10),
  snapshotKey: process.env.SNAPSHOT_KEY || 'custody',
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment
 *
 * Set RATE_LIMIT_DISABLED=true to disable all rate limiting (NOT recommended for production)
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  // Global rate limiter (all routes)
  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '300', 10)
      : isTest
      ? 10000
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  // Transfers touching the rail or moving budget
  transfer: {
    windowMs: parseInt(process.env.TRANSFER_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.TRANSFER_RATE_LIMIT_MAX || '10', 10)
      : isTest
      ? 10000
      : parseInt(process.env.TRANSFER_RATE_LIMIT_MAX || '100', 10),
  },

  // Read-only queries
  query: {
    windowMs: parseInt(process.env.QUERY_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.QUERY_RATE_LIMIT_MAX || '60', 10)
      : isTest
      ? 10000
      : parseInt(process.env.QUERY_RATE_LIMIT_MAX || '300', 10),
  },
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// SECURITY CONFIGURATION
// =============================================================================

export const SECURITY_CONFIG = {
  contentSecurityPolicy: isProduction,
  hsts: isProduction,
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

  const required = [
    'JWT_SECRET',
    'MONGODB_URI',
    'RAIL_URL',
    'CUSTODY_ACCOUNT_OWNER',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }

  if (RAIL_CONFIG.mode === 'simulated') {
    throw new Error('RAIL_MODE=simulated is not allowed in production');
  }

  if (PERSISTENCE_MODE === 'memory') {
    throw new Error('PERSISTENCE=memory is not allowed in production');
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
  persistence: PERSISTENCE_MODE,
  railMode: RAIL_CONFIG.mode,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_CONFIG.host,
});
