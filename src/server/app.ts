import express, { type Express } from 'express';
import { setupRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { logger } from './utils/logger';
import { config } from './config';
import type { CommandSessionManager } from './game/CommandSessionManager';

/**
 * What `/metrics` needs from MetricsService.
 */
export interface MetricsSource {
  getMetrics(): Promise<string>;
  getContentType(): string;
}

export interface AppOptions {
  metrics?: MetricsSource | null;
}

export function createApp(manager: CommandSessionManager, options: AppOptions = {}): Express {
  const app = express();
  const metrics = options.metrics ?? null;

  app.use(express.json({ limit: '1mb' }));

  if (config.healthChecks.enabled) {
    /**
     * Liveness check. Returns 200 while the process is serving requests.
     */
    app.get(['/health', '/healthz'], (_req, res) => {
      res.status(200).json({
        status: 'healthy',
        service: config.app.name,
        version: config.app.version,
        sessions: manager.sessionCount,
        timestamp: new Date().toISOString(),
      });
    });
  }

  if (metrics) {
    app.get('/metrics', async (_req, res) => {
      try {
        res.set('Content-Type', metrics.getContentType());
        res.send(await metrics.getMetrics());
      } catch (err) {
        logger.error('Failed to generate /metrics payload', {
          error: err instanceof Error ? err.message : String(err),
        });
        res.status(500).send('metrics_unavailable');
      }
    });
  }

  app.use('/api', setupRoutes(manager));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
