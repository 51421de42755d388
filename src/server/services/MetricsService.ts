/**
 * MetricsService - Prometheus metrics for the command pipeline.
 *
 * This service provides:
 * - Command outcome counters (accepted / rejected, keyed by error code)
 * - Pipeline latency histogram
 * - Broadcast, retry and session-reset counters
 * - Active session and WebSocket connection gauges
 *
 * All metrics are registered with the default prom-client registry and exposed
 * via the /metrics endpoint for Prometheus scraping.
 */

import client, { Registry, Counter, Histogram, Gauge } from 'prom-client';
import { logger } from '../utils/logger';

export type CommandOutcomeLabel = 'accepted' | 'rejected';

/**
 * Singleton MetricsService class that manages all Prometheus metrics.
 */
export class MetricsService {
  private static instance: MetricsService | null = null;
  private readonly registry: Registry;

  // ===================
  // Command Pipeline Metrics
  // ===================

  /** Counter: Commands processed, by outcome and error code ("none" when accepted) */
  public readonly commandOutcomesTotal: Counter<'outcome' | 'code'>;

  /** Histogram: Time from decode to publish, in seconds */
  public readonly commandPipelineDuration: Histogram<'outcome'>;

  /** Counter: BROADCAST messages delivered, one per subscriber */
  public readonly broadcastsTotal: Counter<string>;

  /** Counter: Internal execution retries */
  public readonly executionRetriesTotal: Counter<string>;

  /** Counter: Sessions torn down after a fatal error */
  public readonly sessionResetsTotal: Counter<'reason'>;

  // ===================
  // Session / Connection Metrics
  // ===================

  /** Gauge: Sessions currently held in memory */
  public readonly commandSessionsActive: Gauge<string>;

  /** Gauge: Active WebSocket connections */
  public readonly websocketConnections: Gauge<string>;

  /**
   * Private constructor - use getInstance() instead.
   */
  private constructor() {
    this.registry = client.register;

    this.commandOutcomesTotal = new Counter({
      name: 'command_outcomes_total',
      help: 'Total commands processed by outcome and error code',
      labelNames: ['outcome', 'code'] as const,
    });

    this.commandPipelineDuration = new Histogram({
      name: 'command_pipeline_duration_seconds',
      help: 'Duration of the validate/execute/publish pipeline in seconds',
      labelNames: ['outcome'] as const,
      buckets: [0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
    });

    this.broadcastsTotal = new Counter({
      name: 'broadcasts_total',
      help: 'Total BROADCAST messages delivered to subscribers',
    });

    this.executionRetriesTotal = new Counter({
      name: 'command_execution_retries_total',
      help: 'Total internal retries after an execution failure',
    });

    this.sessionResetsTotal = new Counter({
      name: 'command_session_resets_total',
      help: 'Total sessions reset after a fatal error',
      labelNames: ['reason'] as const,
    });

    this.commandSessionsActive = new Gauge({
      name: 'command_sessions_active',
      help: 'Number of command sessions currently in memory',
    });

    this.websocketConnections = new Gauge({
      name: 'websocket_connections',
      help: 'Number of active WebSocket connections',
    });

    logger.info('MetricsService initialized');
  }

  /**
   * Get the singleton MetricsService instance.
   */
  public static getInstance(): MetricsService {
    if (!MetricsService.instance) {
      MetricsService.instance = new MetricsService();
    }
    return MetricsService.instance;
  }

  /**
   * Reset the singleton instance (for testing only).
   */
  public static resetInstance(): void {
    if (MetricsService.instance) {
      client.register.clear();
      MetricsService.instance = null;
    }
  }

  /**
   * Get metrics in Prometheus text format.
   */
  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /**
   * Get the content type for metrics response.
   */
  public getContentType(): string {
    return this.registry.contentType;
  }

  // ===================
  // Command Helpers
  // ===================

  public recordCommandOutcome(
    outcome: CommandOutcomeLabel,
    code: string | null,
    durationSeconds: number
  ): void {
    this.commandOutcomesTotal.labels(outcome, code ?? 'none').inc();
    this.commandPipelineDuration.labels(outcome).observe(durationSeconds);
  }

  public recordBroadcasts(count: number): void {
    if (count > 0) {
      this.broadcastsTotal.inc(count);
    }
  }

  public recordExecutionRetry(): void {
    this.executionRetriesTotal.inc();
  }

  public recordSessionReset(reason: string): void {
    this.sessionResetsTotal.labels(reason).inc();
  }

  public setActiveSessions(count: number): void {
    this.commandSessionsActive.set(count);
  }

  // ===================
  // WebSocket Helpers
  // ===================

  public incWebSocketConnections(): void {
    this.websocketConnections.inc();
  }

  public decWebSocketConnections(): void {
    this.websocketConnections.dec();
  }
}

export const getMetricsService = (): MetricsService => MetricsService.getInstance();

export default MetricsService;
