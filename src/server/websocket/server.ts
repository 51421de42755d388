import { Server as SocketIOServer, type Socket } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';
import { config } from '../config';
import { encodeSnapshot } from '../../shared/codec/envelopeCodec';
import { SocketPayloadSchemas } from '../../shared/validation/commandSchemas';
import type {
  ClientToServerEvents,
  ServerDelivery,
  ServerToClientEvents,
  WebSocketErrorCode,
  WebSocketErrorPayload,
} from '../../shared/types/websocket';
import { CommandSessionManager, type CommandSessionManagerOptions } from '../game/CommandSessionManager';
import type { Transport } from '../game/SessionBroadcaster';

type CommandSocket = Socket<ClientToServerEvents, ServerToClientEvents>;
type CommandIOServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents>;

/**
 * Connection gauge hooks; MetricsService satisfies this.
 */
export interface ConnectionMetrics {
  incWebSocketConnections(): void;
  decWebSocketConnections(): void;
}

/**
 * Routes each delivery to the Socket.IO room named after the connection id.
 * Every socket joins that room automatically.
 */
export class SocketIOTransport implements Transport {
  constructor(private readonly io: CommandIOServer) {}

  deliver(connectionId: string, delivery: ServerDelivery): void {
    const target = this.io.to(connectionId);
    switch (delivery.event) {
      case 'message':
        target.emit('message', delivery.payload);
        break;
      case 'session_joined':
        target.emit('session_joined', delivery.payload);
        break;
      case 'session_snapshot':
        target.emit('session_snapshot', delivery.payload);
        break;
      case 'session_reset':
        target.emit('session_reset', delivery.payload);
        break;
      case 'error':
        target.emit('error', delivery.payload);
        break;
    }
  }
}

export interface CommandWebSocketServerOptions extends Omit<CommandSessionManagerOptions, 'transport'> {
  connectionMetrics?: ConnectionMetrics | null;
}

export class CommandWebSocketServer {
  private readonly io: CommandIOServer;
  readonly sessionManager: CommandSessionManager;
  private readonly connectionMetrics: ConnectionMetrics | null;

  constructor(httpServer: HTTPServer, options: CommandWebSocketServerOptions = {}) {
    this.io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents>(httpServer, {
      cors: {
        origin: config.server.websocketOrigin,
        methods: ['GET', 'POST'],
        credentials: true,
      },
      transports: ['websocket', 'polling'],
    });

    const { connectionMetrics, ...managerOptions } = options;
    this.connectionMetrics = connectionMetrics ?? null;
    this.sessionManager = new CommandSessionManager({
      ...managerOptions,
      transport: new SocketIOTransport(this.io),
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers() {
    this.io.on('connection', (socket: CommandSocket) => {
      this.connectionMetrics?.incWebSocketConnections();
      logger.info('WebSocket connected', { connectionId: socket.id });

      socket.on('join_session', (data: unknown) => {
        try {
          const { sessionId } = SocketPayloadSchemas.join_session.parse(data);
          this.handleJoinSession(socket, sessionId);
        } catch (error) {
          this.handleHandlerError(socket, 'join_session', error, 'Failed to join session');
        }
      });

      socket.on('leave_session', (data: unknown) => {
        try {
          const { sessionId } = SocketPayloadSchemas.leave_session.parse(data);
          if (this.sessionManager.leave(sessionId, socket.id)) {
            logger.info('Connection left session', { sessionId, connectionId: socket.id });
          }
        } catch (error) {
          this.handleHandlerError(socket, 'leave_session', error, 'Failed to leave session');
        }
      });

      socket.on('request_snapshot', (data: unknown) => {
        try {
          const { sessionId } = SocketPayloadSchemas.request_snapshot.parse(data);
          const snapshot = this.sessionManager.getSnapshot(sessionId);
          if (!snapshot || !this.sessionManager.broadcaster.isSubscribed(sessionId, socket.id)) {
            this.emitError(socket, 'SESSION_NOT_FOUND', 'Not joined to that session', 'request_snapshot');
            return;
          }
          socket.emit('session_snapshot', { session_id: sessionId, state: encodeSnapshot(snapshot) });
        } catch (error) {
          this.handleHandlerError(socket, 'request_snapshot', error, 'Failed to read snapshot');
        }
      });

      socket.on('message', async (data: unknown) => {
        try {
          const text = SocketPayloadSchemas.message.parse(data);
          await this.sessionManager.handleIncoming(text, socket.id);
        } catch (error) {
          this.handleHandlerError(socket, 'message', error, 'Unable to process message');
        }
      });

      socket.on('disconnect', (reason: string) => {
        this.handleDisconnect(socket, reason);
      });
    });
  }

  private handleJoinSession(socket: CommandSocket, sessionId: string): void {
    const { snapshot } = this.sessionManager.join(sessionId, socket.id);
    socket.emit('session_joined', {
      session_id: sessionId,
      connection_id: socket.id,
      version: snapshot.version,
    });
    socket.emit('session_snapshot', { session_id: sessionId, state: encodeSnapshot(snapshot) });
  }

  private handleDisconnect(socket: CommandSocket, reason: string): void {
    this.connectionMetrics?.decWebSocketConnections();
    const left = this.sessionManager.removeConnection(socket.id);
    logger.info('WebSocket disconnected', { connectionId: socket.id, reason, sessions: left });
  }

  private handleHandlerError(socket: CommandSocket, eventName: string, error: unknown, fallback: string): void {
    if (error instanceof ZodError) {
      logger.warn('Rejected WebSocket payload due to validation error', {
        eventName,
        connectionId: socket.id,
        issues: error.issues.map((issue) => issue.message),
      });
      this.emitError(socket, 'INVALID_PAYLOAD', 'Invalid payload', eventName);
      return;
    }

    logger.error('WebSocket handler failed', {
      eventName,
      connectionId: socket.id,
      error: error instanceof Error ? error.message : String(error),
    });
    this.emitError(socket, 'INTERNAL_ERROR', fallback, eventName);
  }

  private emitError(socket: CommandSocket, code: WebSocketErrorCode, message: string, event?: string): void {
    logger.warn('WebSocket error', { code, event, connectionId: socket.id });

    const payload: WebSocketErrorPayload = {
      type: 'error',
      code,
      message,
      ...(event ? { event } : {}),
    };

    socket.emit('error', payload);
  }

  get connectionCount(): number {
    return this.io.sockets.sockets.size;
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.io.close(() => resolve());
    });
  }
}
