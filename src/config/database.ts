/**
 * MongoDB connection for custody snapshots (PERSISTENCE=mongo only)
 */

import mongoose from 'mongoose';
import { config } from './index';
import { createServiceLogger } from '../observability/logger';

const log = createServiceLogger('database');

const CONNECTED = 1;

export const connectDatabase = async (): Promise<void> => {
  if (mongoose.connection.readyState === CONNECTED) {
    log.debug('Database already connected');
    return;
  }

  const { uri, maxPoolSize, minPoolSize, maxIdleTimeMS, serverSelectionTimeoutMS } = config.mongodb;

  try {
    const conn = await mongoose.connect(uri, {
      maxPoolSize,
      minPoolSize,
      maxIdleTimeMS,
      serverSelectionTimeoutMS,
    });
    log.info({ host: conn.connection.host, db: conn.connection.name }, 'MongoDB connected');
  } catch (error) {
    // Without the snapshot store there is nothing to restore custody state from
    log.error({ err: error }, 'MongoDB connection failed');
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  if (mongoose.connection.readyState === 0) {
    return;
  }

  await mongoose.disconnect();
  log.info('MongoDB disconnected');
};

/**
 * Live connection state; snapshot writes fail while this reports false
 */
export const getDatabaseStatus = (): { connected: boolean; readyState: number } => {
  const { readyState } = mongoose.connection;
  return { connected: readyState === CONNECTED, readyState };
};

mongoose.connection.on('error', (err: unknown) => {
  log.error({ err }, 'MongoDB connection error');
});

mongoose.connection.on('disconnected', () => {
  log.warn('MongoDB disconnected, snapshot writes will fail until it returns');
});
