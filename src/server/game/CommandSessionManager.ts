import type { BoardSnapshot, CommandData, WebSocketMessage } from '../../shared/types/command';
import { createDefaultRegistry, type CommandKindRegistry } from '../../shared/commands';
import { decodeEnvelope, salvageCorrelation } from '../../shared/codec/envelopeCodec';
import {
  CommandErrorCode,
  FormatError,
  ProtocolError,
  isFatalError,
  wrapError,
} from '../../shared/errors';
import { config } from '../config';
import { logger, runWithCommandContext } from '../utils/logger';
import { AuthoritativeBoard } from './AuthoritativeBoard';
import type { Clock } from './CommandExecutor';
import { CommandSession, type CommitRecord, type PipelineMetrics } from './CommandSession';
import { PermissiveRuleResolver, type RuleResolver } from './RuleResolver';
import {
  SessionBroadcaster,
  type CommandCorrelation,
  type CommandOrigin,
  type Transport,
} from './SessionBroadcaster';
import { SessionLock } from './SessionLock';
import { loadLayout } from './layouts';

export type BoardFactory = (sessionId: string) => AuthoritativeBoard;

export interface CommandSessionManagerOptions {
  transport: Transport;
  registry?: CommandKindRegistry;
  ruleResolver?: RuleResolver;
  boardFactory?: BoardFactory;
  retryLimit?: number;
  commitLogMaxEntries?: number;
  clock?: Clock;
  metrics?: PipelineMetrics | null;
}

/**
 * What became of one inbound message.
 */
export type IncomingResult =
  | { status: 'accepted'; version: number }
  | { status: 'rejected'; code: string; message: string }
  | { status: 'dropped'; code: string }
  | { status: 'error'; code: string; message: string };

export interface SessionSummary {
  sessionId: string;
  version: number;
  subscribers: number;
  processed: number;
  createdAt: number;
}

export interface JoinResult {
  snapshot: BoardSnapshot;
  newlyJoined: boolean;
}

/**
 * Board factory driven by the `board` config section.
 */
export function createConfiguredBoardFactory(): BoardFactory {
  return () =>
    AuthoritativeBoard.fromLayout(
      loadLayout(config.board.layout, { width: config.board.width, height: config.board.height })
    );
}

/**
 * Owns every live session: creates them on first join, serialises command
 * processing per session and tears a session down when its board is found
 * corrupted.
 */
export class CommandSessionManager {
  readonly broadcaster: SessionBroadcaster;
  private readonly sessions = new Map<string, CommandSession>();
  private readonly locks = new Map<string, SessionLock>();
  private readonly transport: Transport;
  private readonly registry: CommandKindRegistry;
  private readonly ruleResolver: RuleResolver;
  private readonly boardFactory: BoardFactory;
  private readonly retryLimit: number;
  private readonly commitLogMaxEntries: number;
  private readonly clock: Clock;
  private readonly metrics: PipelineMetrics | null;

  constructor(options: CommandSessionManagerOptions) {
    this.transport = options.transport;
    this.broadcaster = new SessionBroadcaster(options.transport);
    this.registry = options.registry ?? createDefaultRegistry();
    this.ruleResolver = options.ruleResolver ?? new PermissiveRuleResolver();
    this.clock = options.clock ?? Date.now;
    this.boardFactory = options.boardFactory ?? createConfiguredBoardFactory();
    this.retryLimit = options.retryLimit ?? config.execution.retryLimit;
    this.commitLogMaxEntries = options.commitLogMaxEntries ?? config.sessions.commitLogMaxEntries;
    this.metrics = options.metrics ?? null;
  }

  getOrCreateSession(sessionId: string): CommandSession {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const session = new CommandSession({
      sessionId,
      board: this.boardFactory(sessionId),
      registry: this.registry,
      ruleResolver: this.ruleResolver,
      broadcaster: this.broadcaster,
      retryLimit: this.retryLimit,
      commitLogMaxEntries: this.commitLogMaxEntries,
      clock: this.clock,
      metrics: this.metrics,
    });
    this.sessions.set(sessionId, session);
    this.metrics?.setActiveSessions(this.sessions.size);
    logger.info('Session created', { sessionId, version: session.version });
    return session;
  }

  getSession(sessionId: string): CommandSession | undefined {
    return this.sessions.get(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values()).map((session) => ({
      sessionId: session.sessionId,
      version: session.version,
      subscribers: this.broadcaster.subscribers(session.sessionId).length,
      processed: session.processed,
      createdAt: session.createdAt,
    }));
  }

  /**
   * Run `operation` with exclusive access to the session.
   */
  withSessionLock<T>(sessionId: string, operation: () => T | Promise<T>): Promise<T> {
    let lock = this.locks.get(sessionId);
    if (!lock) {
      lock = new SessionLock();
      this.locks.set(sessionId, lock);
    }
    const owner = lock;
    return lock.runExclusive(operation).finally(() => this.releaseLock(sessionId, owner));
  }

  /** Locks currently held in the map; one per live or busy session. */
  get lockCount(): number {
    return this.locks.size;
  }

  private releaseLock(sessionId: string, lock: SessionLock): void {
    if (this.locks.get(sessionId) === lock && lock.pending === 0 && !this.sessions.has(sessionId)) {
      this.locks.delete(sessionId);
    }
  }

  /**
   * Subscribe a connection, creating the session if needed. The snapshot is
   * taken synchronously, so every broadcast the connection receives afterwards
   * carries a newer version.
   */
  join(sessionId: string, connectionId: string): JoinResult {
    const session = this.getOrCreateSession(sessionId);
    const newlyJoined = this.broadcaster.subscribe(sessionId, connectionId);
    if (newlyJoined) {
      logger.info('Connection joined session', { sessionId, connectionId });
    }
    return { snapshot: session.snapshot(), newlyJoined };
  }

  leave(sessionId: string, connectionId: string): boolean {
    return this.broadcaster.unsubscribe(sessionId, connectionId);
  }

  removeConnection(connectionId: string): string[] {
    return this.broadcaster.removeConnection(connectionId);
  }

  getSnapshot(sessionId: string): BoardSnapshot | undefined {
    return this.sessions.get(sessionId)?.snapshot();
  }

  getCommitLog(sessionId: string, sinceVersion = 0): CommitRecord[] | undefined {
    return this.sessions.get(sessionId)?.getCommitLog(sinceVersion);
  }

  /**
   * Close a session and tell its subscribers. Waits for in-flight commands.
   */
  endSession(sessionId: string, reason = 'Session ended'): Promise<boolean> {
    return this.withSessionLock(sessionId, () => this.teardown(sessionId, 'session_ended', reason));
  }

  /**
   * Discard the session's authoritative state. Subscribers are notified and
   * must join again to receive a fresh board.
   */
  resetSession(sessionId: string, code: string, reason: string): Promise<boolean> {
    return this.withSessionLock(sessionId, () => this.teardown(sessionId, code, reason));
  }

  /**
   * Decode and process one inbound COMMAND envelope from a connection.
   */
  async handleIncoming(text: string, connectionId: string): Promise<IncomingResult> {
    let message: WebSocketMessage;
    try {
      message = decodeEnvelope(text);
    } catch (error) {
      return this.handleUndecodable(error, text, connectionId);
    }

    if (message.messageType !== 'command') {
      const protocolError = new ProtocolError(
        CommandErrorCode.UNKNOWN_MESSAGE_TYPE,
        `Clients may not send ${message.messageType} messages`,
        { connectionId, sessionId: message.sessionId }
      );
      logger.warn('Dropping inbound message', { connectionId, code: protocolError.code, error: protocolError.message });
      return { status: 'dropped', code: protocolError.code };
    }

    const origin: CommandOrigin = {
      connectionId,
      clientId: message.clientId,
      sessionId: message.sessionId,
    };
    return this.submit(message.commandData, origin);
  }

  /**
   * Process a decoded command on behalf of `origin`.
   */
  submit(command: CommandData, origin: CommandOrigin): Promise<IncomingResult> {
    const context = {
      sessionId: origin.sessionId,
      connectionId: origin.connectionId,
      clientId: origin.clientId,
      pieceId: command.pieceId,
      kind: command.kind,
      timestamp: command.timestamp,
    };

    if (!this.broadcaster.isSubscribed(origin.sessionId, origin.connectionId)) {
      return Promise.resolve(
        runWithCommandContext(context, () =>
          this.reject(command, origin, CommandErrorCode.NOT_IN_SESSION, `Not joined to session '${origin.sessionId}'`)
        )
      );
    }

    return this.withSessionLock(origin.sessionId, () =>
      runWithCommandContext(context, () => this.processLocked(command, origin))
    );
  }

  private processLocked(command: CommandData, origin: CommandOrigin): IncomingResult {
    const session = this.sessions.get(origin.sessionId);
    if (!session || !this.broadcaster.isSubscribed(origin.sessionId, origin.connectionId)) {
      // The session was torn down while this command waited for the lock.
      return this.reject(command, origin, CommandErrorCode.NOT_IN_SESSION, `Not joined to session '${origin.sessionId}'`);
    }

    const started = this.clock();
    try {
      const { outcome, report } = session.process(command, origin);
      const seconds = Math.max(0, this.clock() - started) / 1000;
      if (outcome.accepted) {
        this.metrics?.recordCommandOutcome('accepted', null, seconds);
        this.metrics?.recordBroadcasts(report.broadcasts);
        return { status: 'accepted', version: outcome.result.version };
      }
      this.metrics?.recordCommandOutcome('rejected', outcome.code, seconds);
      return { status: 'rejected', code: outcome.code, message: outcome.message };
    } catch (error) {
      const commandError = wrapError(error, { sessionId: origin.sessionId });
      if (isFatalError(commandError)) {
        logger.error('Board corruption detected, resetting session', {
          error: commandError.message,
          context: commandError.context,
        });
        const result = this.reject(command, origin, commandError.code, commandError.message);
        this.teardown(origin.sessionId, commandError.code, commandError.message);
        return result;
      }

      logger.error('Unexpected failure while processing command', {
        error: commandError.message,
        stack: error instanceof Error ? error.stack : undefined,
      });
      return this.reject(command, origin, commandError.code, commandError.message);
    }
  }

  private reject(
    command: CommandCorrelation,
    origin: CommandOrigin,
    code: string,
    message: string
  ): IncomingResult {
    this.broadcaster.publish({ accepted: false, command, code, message }, origin);
    this.metrics?.recordCommandOutcome('rejected', code, 0);
    return { status: 'rejected', code, message };
  }

  private handleUndecodable(error: unknown, text: string, connectionId: string): IncomingResult {
    if (error instanceof ProtocolError) {
      logger.warn('Dropping inbound message', { connectionId, code: error.code, error: error.message });
      return { status: 'dropped', code: error.code };
    }

    const commandError = error instanceof FormatError ? error : wrapError(error, { connectionId });
    const salvaged = salvageCorrelation(text);
    if (salvaged) {
      logger.info('Rejecting malformed command', { connectionId, sessionId: salvaged.sessionId, error: commandError.message });
      const origin: CommandOrigin = { connectionId, clientId: salvaged.clientId, sessionId: salvaged.sessionId };
      const correlation: CommandCorrelation = {
        timestamp: salvaged.timestamp,
        pieceId: salvaged.pieceId,
        kind: salvaged.kind,
      };
      return this.reject(correlation, origin, commandError.code, commandError.message);
    }

    logger.warn('Malformed message without correlation key', { connectionId, error: commandError.message });
    this.transport.deliver(connectionId, {
      event: 'error',
      payload: {
        type: 'error',
        code: commandError.code === CommandErrorCode.FORMAT_INVALID ? 'FORMAT_INVALID' : 'INTERNAL_ERROR',
        event: 'message',
        message: commandError.message,
      },
    });
    return { status: 'error', code: commandError.code, message: commandError.message };
  }

  private teardown(sessionId: string, code: string, reason: string): boolean {
    const existed = this.sessions.delete(sessionId);
    const former = this.broadcaster.clearSession(sessionId);
    this.broadcaster.notifySession(
      sessionId,
      { event: 'session_reset', payload: { session_id: sessionId, code, reason } },
      former
    );
    if (existed) {
      this.metrics?.recordSessionReset(code);
      this.metrics?.setActiveSessions(this.sessions.size);
      logger.warn('Session torn down', { sessionId, code, reason, subscribers: former.length });
    }
    return existed;
  }
}
