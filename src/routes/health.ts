import { Router, Request, Response } from 'express';
import { config } from '../config';
import { getDatabaseStatus } from '../config/database';
import { isRedisConnected } from '../config/redis';
import { Custody } from '../custody';

export const createHealthRoutes = (custody: Custody): Router => {
  const router = Router();

  // Snapshots only need MongoDB when that is where they are kept
  const databaseReady = (): boolean =>
    config.persistence === 'memory' || getDatabaseStatus().connected;

  router.get('/', (_req: Request, res: Response) => {
    const dbStatus = getDatabaseStatus();
    const persistence = custody.persistence.getStatus();

    const isHealthy = databaseReady() && persistence.lastError === null;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        database: {
          mode: config.persistence,
          connected: dbStatus.connected,
          readyState: dbStatus.readyState,
        },
        redis: {
          connected: isRedisConnected(),
        },
        persistence: {
          snapshotVersion: persistence.version,
          pending: persistence.pending,
          lastError: persistence.lastError,
        },
        rail: {
          mode: custody.railMode,
        },
        custody: {
          entityLocksHeld: custody.locks.size,
          unreconciledTransfers: custody.journal.countUnreconciled(),
        },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = databaseReady();

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
