import type { CommandData, ExecutionResult } from '../../shared/types/command';
import type { CommandKindRegistry } from '../../shared/commands';
import { CommandErrorCode, ExecutionError, ValidationError } from '../../shared/errors';
import { logger } from '../utils/logger';
import type { AuthoritativeBoard } from './AuthoritativeBoard';
import { CommandExecutor, type Clock } from './CommandExecutor';
import { CommandValidator } from './CommandValidator';
import type { RuleResolver } from './RuleResolver';
import type { CommandOrigin, CommandOutcome, PublishReport, SessionBroadcaster } from './SessionBroadcaster';

/**
 * Subset of MetricsService the pipeline reports to.
 */
export interface PipelineMetrics {
  recordCommandOutcome(outcome: 'accepted' | 'rejected', code: string | null, durationSeconds: number): void;
  recordBroadcasts(count: number): void;
  recordExecutionRetry(): void;
  recordSessionReset(reason: string): void;
  setActiveSessions(count: number): void;
}

/** A failed execution is retried at most this many times. */
export const MAX_EXECUTION_RETRIES = 1;

export interface CommitRecord {
  version: number;
  clientId: string;
  command: CommandData;
  result: ExecutionResult;
}

export interface CommandSessionOptions {
  sessionId: string;
  board: AuthoritativeBoard;
  registry: CommandKindRegistry;
  ruleResolver: RuleResolver;
  broadcaster: SessionBroadcaster;
  /** Internal retries after ExecutionError, capped at MAX_EXECUTION_RETRIES. */
  retryLimit: number;
  commitLogMaxEntries: number;
  clock?: Clock;
  metrics?: PipelineMetrics | null;
}

export interface ProcessResult {
  outcome: CommandOutcome;
  report: PublishReport;
  attempts: number;
}

/**
 * One session's board and pipeline. Not concurrency-safe on its own: callers
 * serialise `process` through the session lock.
 */
export class CommandSession {
  readonly sessionId: string;
  readonly createdAt: number;
  private readonly board: AuthoritativeBoard;
  private readonly validator: CommandValidator;
  private readonly executor: CommandExecutor;
  private readonly broadcaster: SessionBroadcaster;
  private readonly retryLimit: number;
  private readonly commitLogMaxEntries: number;
  private readonly metrics: PipelineMetrics | null;
  private readonly commits: CommitRecord[] = [];
  private processedCount = 0;

  constructor(options: CommandSessionOptions) {
    this.sessionId = options.sessionId;
    this.board = options.board;
    this.validator = new CommandValidator(options.registry, options.ruleResolver);
    this.executor = new CommandExecutor(options.clock);
    this.broadcaster = options.broadcaster;
    this.retryLimit = Math.min(Math.max(options.retryLimit, 0), MAX_EXECUTION_RETRIES);
    this.commitLogMaxEntries = options.commitLogMaxEntries;
    this.metrics = options.metrics ?? null;
    this.createdAt = (options.clock ?? Date.now)();
  }

  get version(): number {
    return this.board.version;
  }

  get processed(): number {
    return this.processedCount;
  }

  snapshot() {
    return this.board.snapshot();
  }

  /**
   * Committed commands with a version above `sinceVersion`, oldest first.
   * Only the most recent `commitLogMaxEntries` are retained.
   */
  getCommitLog(sinceVersion = 0): CommitRecord[] {
    return this.commits.filter((record) => record.version > sinceVersion);
  }

  /**
   * assert invariants → validate → execute (with retries) → record → publish.
   *
   * @throws BoardCorruptionError when the board is found corrupted; the caller
   * must tear the session down.
   */
  process(command: CommandData, origin: CommandOrigin): ProcessResult {
    this.processedCount += 1;
    this.board.assertInvariants();

    const validation = this.validator.validate(command, this.board.view());
    if (!validation.valid) {
      const rejection = new ValidationError(validation.code, validation.reason, { stage: validation.stage });
      logger.info('Command rejected', {
        stage: validation.stage,
        code: rejection.code,
        category: rejection.category,
        reason: rejection.message,
      });
      const outcome: CommandOutcome = {
        accepted: false,
        command,
        code: rejection.code,
        message: rejection.message,
      };
      return { outcome, report: this.broadcaster.publish(outcome, origin), attempts: 0 };
    }

    let attempts = 0;
    let result: ExecutionResult | null = null;
    let lastError: ExecutionError | null = null;
    while (result === null && attempts <= this.retryLimit) {
      attempts += 1;
      try {
        result = this.executor.execute(validation.prepared, this.board);
      } catch (error) {
        if (!(error instanceof ExecutionError)) {
          throw error;
        }
        lastError = error;
        if (attempts <= this.retryLimit) {
          this.metrics?.recordExecutionRetry();
          logger.warn('Execution failed, retrying', { attempt: attempts, error: error.message });
        }
      }
    }

    if (result === null) {
      const message = lastError?.message ?? 'Execution failed';
      logger.warn('Command execution failed', { attempts, error: message });
      const outcome: CommandOutcome = {
        accepted: false,
        command,
        code: CommandErrorCode.EXECUTION_FAILED,
        message,
      };
      return { outcome, report: this.broadcaster.publish(outcome, origin), attempts };
    }

    this.commits.push({ version: result.version, clientId: origin.clientId, command, result });
    if (this.commits.length > this.commitLogMaxEntries) {
      this.commits.splice(0, this.commits.length - this.commitLogMaxEntries);
    }

    logger.info('Command committed', { version: result.version, resultKind: result.kind });
    const outcome: CommandOutcome = { accepted: true, command, result };
    return { outcome, report: this.broadcaster.publish(outcome, origin), attempts };
  }
}
