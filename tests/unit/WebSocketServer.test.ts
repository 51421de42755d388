import { createServer } from 'http';
import { CommandWebSocketServer } from '../../src/server/websocket/server';
import {
  buildCommandMessage,
  decodeEnvelope,
  encodeEnvelope,
  encodeSnapshot,
} from '../../src/shared/codec/envelopeCodec';
import { moveCommand, smallBoard } from '../helpers/commandTestUtils';

type Handler = (payload?: unknown) => unknown;

/**
 * Stand-in for a connected Socket.IO socket: records emits and lets the test
 * fire client events at the handlers the server registered.
 */
class FakeSocket {
  readonly emit = jest.fn<void, [string, unknown?]>();
  private readonly handlers = new Map<string, Handler>();

  constructor(readonly id: string) {}

  on(event: string, handler: Handler): this {
    this.handlers.set(event, handler);
    return this;
  }

  async trigger(event: string, payload?: unknown): Promise<void> {
    const handler = this.handlers.get(event);
    if (!handler) {
      throw new Error(`no handler for ${event}`);
    }
    await handler(payload);
  }

  emitted(event: string): unknown[] {
    return this.emit.mock.calls.filter(([name]) => name === event).map(([, payload]) => payload);
  }
}

interface FakeIoHandle {
  readonly options: unknown;
  connect(socket: FakeSocket): void;
}

const mockIoInstances: FakeIoHandle[] = [];

// Minimal Socket.IO server: rooms are socket ids, nothing touches the network.
jest.mock('socket.io', () => {
  class FakeSocketIOServer {
    readonly options: unknown;
    readonly sockets = { sockets: new Map<string, FakeSocket>() };
    private connectionHandler: ((socket: FakeSocket) => void) | null = null;

    constructor(_httpServer: unknown, options: unknown) {
      this.options = options;
      mockIoInstances.push(this);
    }

    on(event: string, handler: (socket: FakeSocket) => void): void {
      if (event === 'connection') {
        this.connectionHandler = handler;
      }
    }

    to(room: string) {
      return {
        emit: (event: string, payload: unknown) => {
          this.sockets.sockets.get(room)?.emit(event, payload);
        },
      };
    }

    connect(socket: FakeSocket): void {
      this.sockets.sockets.set(socket.id, socket);
      this.connectionHandler?.(socket);
    }

    close(callback?: () => void): void {
      callback?.();
    }
  }

  return { Server: FakeSocketIOServer };
});

describe('CommandWebSocketServer', () => {
  const httpServer = createServer();
  const connectionMetrics = {
    incWebSocketConnections: jest.fn(),
    decWebSocketConnections: jest.fn(),
  };

  let server: CommandWebSocketServer;
  let io: FakeIoHandle;

  function connect(id: string): FakeSocket {
    const socket = new FakeSocket(id);
    io.connect(socket);
    return socket;
  }

  beforeEach(() => {
    mockIoInstances.length = 0;
    server = new CommandWebSocketServer(httpServer, {
      boardFactory: () => smallBoard(),
      retryLimit: 0,
      commitLogMaxEntries: 10,
      clock: () => 3_000,
      connectionMetrics,
    });
    const [instance] = mockIoInstances;
    if (!instance) {
      throw new Error('Socket.IO server was not constructed');
    }
    io = instance;
  });

  it('configures CORS and transports', () => {
    expect(io.options).toEqual({
      cors: { origin: 'http://localhost:5173', methods: ['GET', 'POST'], credentials: true },
      transports: ['websocket', 'polling'],
    });
  });

  it('counts connections and disconnections', async () => {
    const socket = connect('sock-1');
    expect(connectionMetrics.incWebSocketConnections).toHaveBeenCalledTimes(1);
    expect(server.connectionCount).toBe(1);

    await socket.trigger('disconnect', 'transport close');
    expect(connectionMetrics.decWebSocketConnections).toHaveBeenCalledTimes(1);
  });

  describe('join_session', () => {
    it('confirms the join and sends the current snapshot', async () => {
      const socket = connect('sock-1');
      await socket.trigger('join_session', { sessionId: 'room-1' });

      expect(socket.emitted('session_joined')).toEqual([
        { session_id: 'room-1', connection_id: 'sock-1', version: 0 },
      ]);
      expect(socket.emitted('session_snapshot')).toEqual([
        { session_id: 'room-1', state: encodeSnapshot(smallBoard().snapshot()) },
      ]);
      expect(server.sessionManager.broadcaster.subscribers('room-1')).toEqual(['sock-1']);
    });

    it('rejects a payload without a session id', async () => {
      const socket = connect('sock-1');
      await socket.trigger('join_session', { session: 'room-1' });

      expect(socket.emitted('error')).toEqual([
        { type: 'error', code: 'INVALID_PAYLOAD', message: 'Invalid payload', event: 'join_session' },
      ]);
    });

    it('reports an internal error when the session cannot be created', async () => {
      mockIoInstances.length = 0;
      new CommandWebSocketServer(httpServer, {
        boardFactory: () => {
          throw new Error('layout missing');
        },
      });
      const [failing] = mockIoInstances;
      const socket = new FakeSocket('sock-9');
      failing?.connect(socket);

      await socket.trigger('join_session', { sessionId: 'room-1' });
      expect(socket.emitted('error')).toEqual([
        { type: 'error', code: 'INTERNAL_ERROR', message: 'Failed to join session', event: 'join_session' },
      ]);
    });
  });

  describe('message', () => {
    it('routes a command through the pipeline and back to the sockets', async () => {
      const alice = connect('sock-a');
      const bob = connect('sock-b');
      await alice.trigger('join_session', { sessionId: 'room-1' });
      await bob.trigger('join_session', { sessionId: 'room-1' });

      const text = encodeEnvelope(buildCommandMessage(moveCommand('white_pawn', [6, 4], [5, 4], 55), 'alice', 'room-1'));
      await alice.trigger('message', text);

      const toAlice = alice.emitted('message').map((payload) => decodeEnvelope(payload).messageType);
      const toBob = bob.emitted('message').map((payload) => decodeEnvelope(payload).messageType);
      expect(toAlice).toEqual(['response', 'broadcast']);
      expect(toBob).toEqual(['broadcast']);
    });

    it('refuses a payload that is not a string', async () => {
      const socket = connect('sock-1');
      await socket.trigger('message', { message_type: 'command' });
      expect(socket.emitted('error')).toEqual([
        { type: 'error', code: 'INVALID_PAYLOAD', message: 'Invalid payload', event: 'message' },
      ]);
    });

    it('forwards an undecodable envelope error to the sender', async () => {
      const socket = connect('sock-1');
      await socket.trigger('message', 'not json at all');
      expect(socket.emitted('error')).toEqual([
        { type: 'error', code: 'FORMAT_INVALID', event: 'message', message: 'Envelope is not valid JSON' },
      ]);
    });
  });

  describe('request_snapshot', () => {
    it('requires the connection to have joined', async () => {
      const socket = connect('sock-1');
      await socket.trigger('request_snapshot', { sessionId: 'room-1' });
      expect(socket.emitted('error')).toEqual([
        {
          type: 'error',
          code: 'SESSION_NOT_FOUND',
          message: 'Not joined to that session',
          event: 'request_snapshot',
        },
      ]);
    });

    it('returns the latest snapshot', async () => {
      const socket = connect('sock-1');
      await socket.trigger('join_session', { sessionId: 'room-1' });
      await socket.trigger(
        'message',
        encodeEnvelope(buildCommandMessage(moveCommand('white_pawn', [6, 4], [5, 4]), 'c', 'room-1'))
      );
      socket.emit.mockClear();

      await socket.trigger('request_snapshot', { sessionId: 'room-1' });
      const [payload] = socket.emitted('session_snapshot');
      expect(payload).toMatchObject({ session_id: 'room-1', state: { version: 1 } });
    });
  });

  describe('leaving', () => {
    it('unsubscribes on leave_session', async () => {
      const socket = connect('sock-1');
      await socket.trigger('join_session', { sessionId: 'room-1' });
      await socket.trigger('leave_session', { sessionId: 'room-1' });
      expect(server.sessionManager.broadcaster.subscribers('room-1')).toEqual([]);
    });

    it('unsubscribes from every session on disconnect', async () => {
      const socket = connect('sock-1');
      await socket.trigger('join_session', { sessionId: 'room-1' });
      await socket.trigger('join_session', { sessionId: 'room-2' });
      await socket.trigger('disconnect', 'client namespace disconnect');

      expect(server.sessionManager.broadcaster.isSubscribed('room-1', 'sock-1')).toBe(false);
      expect(server.sessionManager.broadcaster.isSubscribed('room-2', 'sock-1')).toBe(false);
    });
  });

  it('closes the Socket.IO server', async () => {
    await expect(server.close()).resolves.toBeUndefined();
  });
});
