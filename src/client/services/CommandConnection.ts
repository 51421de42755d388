import { io, type Socket } from 'socket.io-client';
import type {
  ClientToServerEvents,
  ServerToClientEvents,
  SessionResetPayload,
  SessionSnapshotPayload,
  WebSocketErrorPayload,
} from '../../shared/types/websocket';
import { decodeSnapshot } from '../../shared/codec/envelopeCodec';
import { CommandErrorCode, type StaleStateError } from '../../shared/errors';
import { CommandLifecycleTracker } from '../commands/CommandLifecycleTracker';
import type { ClientCommand } from '../commands/ClientCommand';
import { StateReconciler } from '../sync/StateReconciler';
import { consoleLogger, type ClientLogger } from '../utils/clientLogger';

/** Reset code the server uses when a session is closed on purpose. */
const SESSION_ENDED = 'session_ended';

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

type CommandClientSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

export interface CommandConnectionHandlers {
  onStatusChange?: (status: ConnectionStatus) => void;
  onSessionReset?: (payload: SessionResetPayload) => void;
  onError?: (error: WebSocketErrorPayload | Error) => void;
}

export interface CommandConnectionOptions {
  url: string;
  clientId: string;
  handlers?: CommandConnectionHandlers;
  logger?: ClientLogger;
  clock?: () => number;
}

/**
 * Socket.IO-backed client for one session. Owns the lifecycle tracker and the
 * reconciler and wires them to the socket:
 *
 * - `message` envelopes go to the tracker (responses) and, through it, to the
 *   reconciler (broadcasts)
 * - `session_snapshot` goes to the reconciler
 * - a version gap in the reconciler triggers `request_snapshot`
 * - switching sessions, or a `session_reset` for the current one, clears the
 *   reconciler and rejects commands still awaiting a RESPONSE
 */
export class CommandConnection {
  readonly tracker: CommandLifecycleTracker;
  readonly reconciler: StateReconciler;
  private socket: CommandClientSocket | null = null;
  private currentSessionId: string | null = null;
  private currentStatus: ConnectionStatus = 'disconnected';
  private readonly url: string;
  private readonly handlers: CommandConnectionHandlers;
  private readonly logger: ClientLogger;

  constructor(options: CommandConnectionOptions) {
    this.url = options.url;
    this.handlers = options.handlers ?? {};
    this.logger = options.logger ?? consoleLogger;
    this.reconciler = new StateReconciler({
      logger: this.logger,
      onResyncRequired: (error) => this.handleResyncRequired(error),
    });
    this.tracker = new CommandLifecycleTracker({
      clientId: options.clientId,
      sessionId: '',
      reconciler: this.reconciler,
      logger: this.logger,
      ...(options.clock ? { clock: options.clock } : {}),
      sender: {
        send: (envelope) => {
          if (!this.socket) {
            throw new Error('Not connected');
          }
          this.socket.emit('message', envelope);
        },
      },
    });
  }

  get sessionId(): string | null {
    return this.currentSessionId;
  }

  get status(): ConnectionStatus {
    return this.currentStatus;
  }

  private setStatus(status: ConnectionStatus): void {
    this.currentStatus = status;
    this.handlers.onStatusChange?.(status);
  }

  connect(sessionId: string): void {
    if (this.currentSessionId === sessionId && this.socket) {
      return;
    }

    const previousSessionId = this.currentSessionId;
    this.disconnect();
    if (previousSessionId !== sessionId) {
      this.forgetSession(CommandErrorCode.NOT_IN_SESSION, `Switched to session ${sessionId} before a response arrived`);
    }
    this.setStatus('connecting');
    this.currentSessionId = sessionId;
    this.tracker.setSessionId(sessionId);

    const socket: CommandClientSocket = io(this.url, {
      transports: ['websocket', 'polling'],
    });
    this.socket = socket;

    socket.on('connect', () => {
      this.setStatus('connected');
      socket.emit('join_session', { sessionId });
    });

    socket.on('connect_error', (err: Error) => {
      this.handlers.onError?.(err);
      this.setStatus('disconnected');
    });

    socket.on('message', (envelope: string) => {
      this.tracker.handleIncoming(envelope);
    });

    socket.on('session_snapshot', (payload: SessionSnapshotPayload) => {
      this.handleSnapshot(payload);
    });

    socket.on('session_reset', (payload: SessionResetPayload) => {
      this.handleSessionReset(socket, payload);
    });

    socket.on('error', (payload: WebSocketErrorPayload) => {
      this.handlers.onError?.(payload);
    });

    socket.on('disconnect', (reason) => {
      this.logger.info('Disconnected', { reason });
      this.setStatus('disconnected');
      if (reason === 'io client disconnect') {
        this.socket = null;
      }
    });
  }

  disconnect(): void {
    if (this.socket) {
      if (this.currentSessionId) {
        this.socket.emit('leave_session', { sessionId: this.currentSessionId });
      }
      this.socket.disconnect();
      this.socket = null;
    }
    this.currentSessionId = null;
    if (this.currentStatus !== 'disconnected') {
      this.setStatus('disconnected');
    }
  }

  /**
   * Send a command created through (or tracked by) this connection's tracker.
   */
  submit(command: ClientCommand): void {
    this.tracker.send(command);
  }

  requestSnapshot(): boolean {
    if (!this.socket || !this.currentSessionId) {
      this.logger.warn('requestSnapshot called without an active session');
      return false;
    }
    this.socket.emit('request_snapshot', { sessionId: this.currentSessionId });
    return true;
  }

  private handleSessionReset(socket: CommandClientSocket, payload: SessionResetPayload): void {
    this.logger.warn('Session reset by server', { sessionId: payload.session_id, code: payload.code });
    if (payload.session_id === this.currentSessionId) {
      this.forgetSession(payload.code, payload.reason);
      // An ended session stays ended; joining again would start a new board.
      if (payload.code !== SESSION_ENDED) {
        socket.emit('join_session', { sessionId: payload.session_id });
      }
    }
    this.handlers.onSessionReset?.(payload);
  }

  /**
   * Drop everything tied to the current board: mirrored state and commands
   * whose RESPONSE will never come.
   */
  private forgetSession(code: string, message: string): void {
    this.reconciler.reset();
    this.tracker.abandonPending(code, message);
  }

  private handleSnapshot(payload: SessionSnapshotPayload): void {
    if (payload.session_id !== this.currentSessionId) {
      this.logger.debug('Ignoring snapshot for another session', { sessionId: payload.session_id });
      return;
    }
    try {
      this.reconciler.applySnapshot(decodeSnapshot(payload.state));
    } catch (error) {
      this.logger.warn('Dropping malformed snapshot', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private handleResyncRequired(error: StaleStateError): void {
    this.logger.info('Requesting snapshot after version gap', error.context);
    this.requestSnapshot();
  }
}
