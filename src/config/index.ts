import dotenv from 'dotenv';

// .env must be loaded before the environment constants are computed
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  PERSISTENCE_MODE,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_CONFIG,
  JWT_CONFIG,
  RAIL_CONFIG,
  STORAGE_CONFIG,
  RATE_LIMIT_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  SECURITY_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };
export * from './environments';

if (isProduction) {
  validateProductionEnv();
}

/**
 * Service configuration, grouped by concern. Custody state depends only on
 * `persistence`, `mongodb`, `storage` and `rail`; the rest shapes the HTTP
 * surface around it.
 */
export const config = {
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  port: API_CONFIG.port,

  persistence: PERSISTENCE_MODE,
  mongodb: { uri: MONGODB_URI, ...MONGODB_CONFIG },
  storage: STORAGE_CONFIG,
  rail: RAIL_CONFIG,

  redis: REDIS_CONFIG,
  jwt: JWT_CONFIG,
  api: { bodyLimit: API_CONFIG.bodyLimit, corsOrigins: API_CONFIG.corsOrigins },
  rateLimit: RATE_LIMIT_CONFIG,
  logging: LOG_CONFIG,
  security: SECURITY_CONFIG,
};

export type Config = typeof config;
