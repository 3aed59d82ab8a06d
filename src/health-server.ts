import express, { type Express } from 'express';
import type { Server } from 'http';
import { config } from './config.js';
import { logger } from './logger.js';
import type { RefreshStats } from './services/RefreshCoordinator.js';

export interface HealthChecks {
  isReady(): boolean;
  liveSessionId(): string | null;
  refreshStats(): RefreshStats;
  checkDatabase(): Promise<void>;
}

/**
 * `/live` always answers; `/ready` follows the gateway; `/health` also
 * pings the database and reports surface state.
 */
export function createHealthApp(checks: HealthChecks): Express {
  const app = express();

  app.get('/live', (_req, res) => {
    res.status(200).json({ alive: true });
  });

  app.get('/ready', (_req, res) => {
    const ready = checks.isReady();
    res.status(ready ? 200 : 503).json({ ready });
  });

  app.get('/health', (_req, res) => {
    void (async (): Promise<void> => {
      let database = 'ok';
      try {
        await checks.checkDatabase();
      } catch (error) {
        database = error instanceof Error ? error.message : String(error);
      }

      const healthy = checks.isReady() && database === 'ok';
      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'healthy' : 'degraded',
        instance: config.instanceId,
        uptime: process.uptime(),
        database,
        liveSession: checks.liveSessionId(),
        refresh: checks.refreshStats(),
      });
    })();
  });

  return app;
}

export function startHealthServer(checks: HealthChecks, port: number): Server {
  return createHealthApp(checks).listen(port, () => {
    logger.info('Health check server started', { port });
  });
}
