import { EventEmitter } from 'events';
import type { CommandKind, JsonValue, WebSocketMessage } from '../../shared/types/command';
import { decodeEnvelope, encodeEnvelope, readResponsePayload } from '../../shared/codec/envelopeCodec';
import { CommandErrorCode, ProtocolError, isCommandError } from '../../shared/errors';
import { consoleLogger, type ClientLogger } from '../utils/clientLogger';
import type { StateReconciler } from '../sync/StateReconciler';
import { ClientCommand } from './ClientCommand';
import { CommandHistory } from './CommandHistory';

/**
 * Outbound half of the transport: hands one encoded COMMAND envelope over.
 */
export interface CommandSender {
  send(envelope: string): void;
}

export interface CommandLifecycleTrackerOptions {
  clientId: string;
  sessionId: string;
  sender?: CommandSender | null;
  reconciler?: StateReconciler | null;
  logger?: ClientLogger;
  clock?: () => number;
}

/**
 * What `handleIncoming` did with a message.
 */
export type IncomingDisposition =
  | 'response_matched'
  | 'response_unmatched'
  | 'broadcast_applied'
  | 'broadcast_ignored'
  | 'dropped';

export const TrackerEvents = {
  CONFIRMED: 'confirmed',
  REJECTED: 'rejected',
  UNMATCHED_RESPONSE: 'unmatched_response',
} as const;

/**
 * Client-side owner of command lifecycles for one session.
 *
 * Commands are matched to RESPONSE messages by timestamp, with the piece id
 * as a secondary key. BROADCAST messages never settle a command; they go to
 * the reconciler.
 *
 * Events:
 * - `confirmed` (command)
 * - `rejected` (command)
 * - `unmatched_response` (ProtocolError, message)
 */
export class CommandLifecycleTracker extends EventEmitter {
  readonly clientId: string;
  private sessionIdValue: string;
  private sender: CommandSender | null;
  private readonly reconciler: StateReconciler | null;
  private readonly logger: ClientLogger;
  private readonly clock: () => number;
  private readonly history = new CommandHistory();
  private readonly pendingByTimestamp = new Map<number, ClientCommand[]>();
  private lastTimestamp = 0;

  constructor(options: CommandLifecycleTrackerOptions) {
    super();
    this.clientId = options.clientId;
    this.sessionIdValue = options.sessionId;
    this.sender = options.sender ?? null;
    this.reconciler = options.reconciler ?? null;
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? Date.now;
  }

  get sessionId(): string {
    return this.sessionIdValue;
  }

  setSessionId(sessionId: string): void {
    this.sessionIdValue = sessionId;
  }

  setSender(sender: CommandSender | null): void {
    this.sender = sender;
  }

  /**
   * Create a command and record it in history. Without an explicit
   * timestamp the clock is used, bumped past the previous one so that
   * timestamps stay unique for this client.
   */
  create(kind: CommandKind, pieceId: string, params: JsonValue[] = [], timestamp?: number): ClientCommand {
    const command = ClientCommand.create(kind, pieceId, params, timestamp ?? this.nextTimestamp());
    this.track(command);
    return command;
  }

  /**
   * Record a command built elsewhere (a factory or CommandBuilder).
   */
  track(command: ClientCommand): void {
    if (this.history.getAll().includes(command)) {
      return;
    }
    this.lastTimestamp = Math.max(this.lastTimestamp, command.timestamp);
    this.history.add(command);
  }

  /**
   * Encode the command, hand it to the sender and mark it sent.
   *
   * @throws Error when the command is not freshly created or no sender is set.
   */
  send(command: ClientCommand): string {
    if (command.status !== 'created') {
      throw new Error(`Command ${command.timestamp} is already ${command.status}`);
    }
    if (!this.sender) {
      throw new Error('No sender configured');
    }

    this.track(command);
    const envelope = encodeEnvelope(command.toMessage(this.clientId, this.sessionIdValue));
    this.sender.send(envelope);

    command.markSent(this.clock());
    const sameTimestamp = this.pendingByTimestamp.get(command.timestamp) ?? [];
    sameTimestamp.push(command);
    this.pendingByTimestamp.set(command.timestamp, sameTimestamp);

    this.logger.debug('Command sent', {
      timestamp: command.timestamp,
      pieceId: command.pieceId,
      kind: command.kind,
    });
    return envelope;
  }

  /**
   * Settle the pending command a RESPONSE refers to. Returns false when no
   * pending command matches (including a duplicate RESPONSE for a command that
   * is already settled).
   */
  handleResponse(message: WebSocketMessage): boolean {
    const payload = readResponsePayload(message);
    const { timestamp, pieceId } = message.commandData;
    const command = this.findPending(timestamp, pieceId);

    if (!command) {
      const settled = this.history.find(timestamp, pieceId);
      const error = new ProtocolError(
        CommandErrorCode.UNMATCHED_RESPONSE,
        settled ? `Duplicate response for command ${timestamp}` : `No pending command for response ${timestamp}`,
        { timestamp, pieceId, duplicate: settled !== undefined }
      );
      this.logger.warn('Dropping unmatched response', { timestamp, pieceId, duplicate: settled !== undefined });
      this.emit(TrackerEvents.UNMATCHED_RESPONSE, error, message);
      return false;
    }

    command.applyResponse(payload);
    this.removePending(command);

    if (command.isConfirmed()) {
      this.emit(TrackerEvents.CONFIRMED, command);
    } else {
      this.logger.info('Command rejected', {
        timestamp,
        pieceId,
        code: command.getErrorCode(),
        message: command.getErrorMessage(),
      });
      this.emit(TrackerEvents.REJECTED, command);
    }
    return true;
  }

  /**
   * Entry point for every inbound envelope. Malformed input and messages of
   * the wrong type are logged and dropped.
   */
  handleIncoming(input: string | WebSocketMessage): IncomingDisposition {
    try {
      const message = typeof input === 'string' ? decodeEnvelope(input) : input;
      switch (message.messageType) {
        case 'response':
          return this.handleResponse(message) ? 'response_matched' : 'response_unmatched';
        case 'broadcast':
          if (!this.reconciler) {
            return 'broadcast_ignored';
          }
          return this.reconciler.applyBroadcast(message) ? 'broadcast_applied' : 'broadcast_ignored';
        case 'command':
          throw new ProtocolError(
            CommandErrorCode.UNKNOWN_MESSAGE_TYPE,
            'Clients do not accept command messages'
          );
      }
    } catch (error) {
      if (!isCommandError(error)) {
        throw error;
      }
      this.logger.warn('Dropping inbound message', { code: error.code, error: error.message });
      return 'dropped';
    }
  }

  /**
   * Reject every command still awaiting a RESPONSE with the given code, e.g.
   * when the session it was sent to is gone. Emits `rejected` for each and
   * returns how many were settled.
   */
  abandonPending(code: string, message: string): number {
    const abandoned: ClientCommand[] = [];
    for (const commands of this.pendingByTimestamp.values()) {
      abandoned.push(...commands);
    }
    this.pendingByTimestamp.clear();

    for (const command of abandoned) {
      command.applyResponse({ success: false, executionResult: null, errorCode: code, errorMessage: message });
      this.emit(TrackerEvents.REJECTED, command);
    }
    if (abandoned.length > 0) {
      this.logger.info('Abandoned pending commands', { code, count: abandoned.length });
    }
    return abandoned.length;
  }

  getPending(): ClientCommand[] {
    return this.history.getAll().filter((command) => command.isPending());
  }

  get pendingCount(): number {
    let count = 0;
    for (const commands of this.pendingByTimestamp.values()) {
      count += commands.length;
    }
    return count;
  }

  getHistory(): CommandHistory {
    return this.history;
  }

  private nextTimestamp(): number {
    const timestamp = Math.max(this.clock(), this.lastTimestamp + 1);
    this.lastTimestamp = timestamp;
    return timestamp;
  }

  private findPending(timestamp: number, pieceId: string): ClientCommand | undefined {
    return this.pendingByTimestamp.get(timestamp)?.find((command) => command.pieceId === pieceId);
  }

  private removePending(command: ClientCommand): void {
    const candidates = this.pendingByTimestamp.get(command.timestamp);
    if (!candidates) {
      return;
    }
    const remaining = candidates.filter((candidate) => candidate !== command);
    if (remaining.length === 0) {
      this.pendingByTimestamp.delete(command.timestamp);
    } else {
      this.pendingByTimestamp.set(command.timestamp, remaining);
    }
  }
}
