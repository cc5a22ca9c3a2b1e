/**
 * Redis Client
 *
 * Shared connection for rate limiting and idempotent response replay.
 * Commands are not queued while the connection is down: they fail at once,
 * and both callers treat a failure as "no limit, no cached reply".
 */

import Redis from 'ioredis';
import { config } from './index';
import { createServiceLogger } from '../observability/logger';

const log = createServiceLogger('redis');

let redisClient: Redis | null = null;

export const getRedisClient = (): Redis => {
  if (!redisClient) {
    const { host, port, password, connectTimeoutMs, maxReconnectAttempts } = config.redis;

    redisClient = new Redis({
      host,
      port,
      password,
      connectionName: 'campaign-custody',
      connectTimeout: connectTimeoutMs,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      retryStrategy: (times: number) => (times > maxReconnectAttempts ? null : Math.min(times * 200, 2000)),
      lazyConnect: true,
    });

    redisClient.on('error', (err) => log.error({ err }, 'Redis client error'));
    redisClient.on('ready', () => log.info({ host, port }, 'Redis ready'));
    redisClient.on('end', () => log.warn('Redis connection closed, limits and replay are off'));
  }

  return redisClient;
};

export const connectRedis = async (): Promise<void> => {
  const client = getRedisClient();
  if (client.status === 'ready') {
    return;
  }
  await client.connect();
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    const client = redisClient;
    redisClient = null;
    if (client.status === 'ready') {
      await client.quit();
    } else {
      client.disconnect();
    }
  }
};

export const isRedisConnected = (): boolean => redisClient?.status === 'ready';
