import { createServer } from 'http';
import client from 'prom-client';
import { createApp } from './app';
import { CommandWebSocketServer } from './websocket/server';
import { logger } from './utils/logger';
import { config } from './config';
import { getMetricsService } from './services/MetricsService';

const metricsService = config.metrics.enabled ? getMetricsService() : null;
if (metricsService) {
  // Register default Prometheus metrics for the Node.js process.
  client.collectDefaultMetrics();
}

const server = createServer();
const wsServer = new CommandWebSocketServer(server, {
  metrics: metricsService,
  connectionMetrics: metricsService,
});
const app = createApp(wsServer.sessionManager, { metrics: metricsService });
server.on('request', app);

function startServer() {
  server.listen(config.server.port, config.server.host, () => {
    logger.info(`Server running on ${config.server.host}:${config.server.port}`, {
      environment: config.nodeEnv,
      layout: config.board.layout,
      board: `${config.board.width}x${config.board.height}`,
      retryLimit: config.execution.retryLimit,
    });
  });
}

function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  wsServer
    .close()
    .then(() => {
      server.close(() => process.exit(0));
    })
    .catch((error: unknown) => {
      logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

startServer();

export { app, server, wsServer };
