import { CommandConnection, type ConnectionStatus } from '../../src/client/services/CommandConnection';
import {
  buildBroadcastMessage,
  buildResponseMessage,
  decodeEnvelope,
  encodeEnvelope,
  encodeSnapshot,
} from '../../src/shared/codec/envelopeCodec';
import type { BoardSnapshot, ExecutionResult } from '../../src/shared/types/command';
import { recordingLogger } from '../helpers/commandTestUtils';

type Listener = (payload?: unknown) => void;

/**
 * Client socket stand-in: the test fires server events through `fire`.
 */
class MockClientSocket {
  readonly emit = jest.fn<void, [string, unknown?]>();
  readonly disconnect = jest.fn();
  private readonly listeners = new Map<string, Listener>();

  constructor(
    readonly url: string,
    readonly options: unknown
  ) {}

  on(event: string, listener: Listener): this {
    this.listeners.set(event, listener);
    return this;
  }

  fire(event: string, payload?: unknown): void {
    this.listeners.get(event)?.(payload);
  }

  emitted(event: string): unknown[] {
    return this.emit.mock.calls.filter(([name]) => name === event).map(([, payload]) => payload);
  }
}

const mockClientSockets: MockClientSocket[] = [];

jest.mock('socket.io-client', () => ({
  io: (url: string, options: unknown) => {
    const socket = new MockClientSocket(url, options);
    mockClientSockets.push(socket);
    return socket;
  },
}));

const fresh: BoardSnapshot = {
  positions: { a: [1, 1] },
  bounds: { width: 8, height: 8 },
  phase: { kind: 'active' },
  version: 0,
};

const snapshot: BoardSnapshot = {
  positions: { white_pawn: [6, 4], black_king: [0, 4] },
  bounds: { width: 8, height: 8 },
  phase: { kind: 'active' },
  version: 2,
};

function moveResult(version: number): ExecutionResult {
  return {
    kind: 'move_executed',
    pieceId: 'white_pawn',
    from: [6, 4],
    to: [5, 4],
    changes: [{ pieceId: 'white_pawn', from: [6, 4], to: [5, 4] }],
    details: {},
    version,
    committedAt: 1,
  };
}

describe('CommandConnection', () => {
  let statuses: ConnectionStatus[];
  let onSessionReset: jest.Mock;
  let onError: jest.Mock;
  let connection: CommandConnection;

  function currentSocket(): MockClientSocket {
    const socket = mockClientSockets[mockClientSockets.length - 1];
    if (!socket) {
      throw new Error('no socket opened');
    }
    return socket;
  }

  beforeEach(() => {
    mockClientSockets.length = 0;
    statuses = [];
    onSessionReset = jest.fn();
    onError = jest.fn();
    connection = new CommandConnection({
      url: 'http://localhost:3000',
      clientId: 'client-a',
      logger: recordingLogger(),
      clock: () => 5_000,
      handlers: {
        onStatusChange: (status) => statuses.push(status),
        onSessionReset,
        onError,
      },
    });
  });

  it('opens a socket and joins the session once connected', () => {
    connection.connect('room-1');
    const socket = currentSocket();

    expect(socket.url).toBe('http://localhost:3000');
    expect(socket.options).toEqual({ transports: ['websocket', 'polling'] });
    expect(statuses).toEqual(['connecting']);

    socket.fire('connect');
    expect(statuses).toEqual(['connecting', 'connected']);
    expect(socket.emitted('join_session')).toEqual([{ sessionId: 'room-1' }]);
    expect(connection.sessionId).toBe('room-1');
    expect(connection.tracker.sessionId).toBe('room-1');
  });

  it('does not reopen a socket for the same session', () => {
    connection.connect('room-1');
    connection.connect('room-1');
    expect(mockClientSockets).toHaveLength(1);
  });

  it('feeds snapshots for its session into the reconciler', () => {
    connection.connect('room-1');
    const socket = currentSocket();

    socket.fire('session_snapshot', { session_id: 'room-2', state: encodeSnapshot({ ...snapshot, version: 9 }) });
    expect(connection.reconciler.isSynced()).toBe(false);

    socket.fire('session_snapshot', { session_id: 'room-1', state: encodeSnapshot(snapshot) });
    expect(connection.reconciler.getVersion()).toBe(2);
    expect(connection.reconciler.getPiecePosition('black_king')).toEqual([0, 4]);
  });

  it('submits commands and settles them from the response', () => {
    connection.connect('room-1');
    const socket = currentSocket();
    socket.fire('connect');

    const command = connection.tracker.create('move', 'white_pawn', [[6, 4], [5, 4]]);
    connection.submit(command);

    const [envelope] = socket.emitted('message');
    expect(decodeEnvelope(envelope)).toMatchObject({
      messageType: 'command',
      clientId: 'client-a',
      sessionId: 'room-1',
      commandData: { timestamp: 5_000, pieceId: 'white_pawn', kind: 'move' },
    });

    const response = buildResponseMessage(
      command.getCommandData(),
      { success: true, executionResult: moveResult(3), errorMessage: null, errorCode: null },
      'client-a',
      'room-1'
    );
    socket.fire('message', encodeEnvelope(response));
    expect(command.isConfirmed()).toBe(true);
  });

  it('requests a snapshot when a broadcast skips versions', () => {
    connection.connect('room-1');
    const socket = currentSocket();
    socket.fire('session_snapshot', { session_id: 'room-1', state: encodeSnapshot(snapshot) });

    const broadcast = buildBroadcastMessage({ timestamp: 1, pieceId: 'white_pawn', kind: 'move' }, moveResult(5), 'room-1');
    socket.fire('message', encodeEnvelope(broadcast));

    expect(socket.emitted('request_snapshot')).toEqual([{ sessionId: 'room-1' }]);
    expect(connection.reconciler.getVersion()).toBe(2);
  });

  it('passes session resets and errors to the handlers', () => {
    connection.connect('room-1');
    const socket = currentSocket();
    const reset = { session_id: 'room-1', code: 'board_corrupted', reason: 'broken' };
    const error = { type: 'error', code: 'INVALID_PAYLOAD', message: 'Invalid payload', event: 'message' };

    socket.fire('session_reset', reset);
    socket.fire('error', error);

    expect(onSessionReset).toHaveBeenCalledWith(reset);
    expect(onError).toHaveBeenCalledWith(error);
  });

  it('starts from a fresh board when switching sessions', () => {
    connection.connect('room-1');
    const first = currentSocket();
    first.fire('connect');
    first.fire('session_snapshot', { session_id: 'room-1', state: encodeSnapshot(snapshot) });
    const command = connection.tracker.create('move', 'white_pawn', [[6, 4], [5, 4]]);
    connection.submit(command);

    connection.connect('room-2');
    const second = currentSocket();
    expect(second).not.toBe(first);
    expect(command.isRejected()).toBe(true);
    expect(command.getErrorCode()).toBe('not_in_session');
    expect(connection.tracker.pendingCount).toBe(0);
    expect(connection.reconciler.isSynced()).toBe(false);

    second.fire('session_snapshot', { session_id: 'room-2', state: encodeSnapshot(fresh) });

    expect(connection.reconciler.getPositions()).toEqual({ a: [1, 1] });
    expect(connection.reconciler.getVersion()).toBe(0);
  });

  it('rejoins with a fresh board after its session is reset', () => {
    connection.connect('room-1');
    const socket = currentSocket();
    socket.fire('connect');
    socket.fire('session_snapshot', { session_id: 'room-1', state: encodeSnapshot(snapshot) });
    const command = connection.tracker.create('resign', 'white_king');
    connection.submit(command);

    socket.fire('session_reset', { session_id: 'room-1', code: 'board_corrupted', reason: 'broken' });

    expect(socket.emitted('join_session')).toEqual([{ sessionId: 'room-1' }, { sessionId: 'room-1' }]);
    expect(command.getErrorCode()).toBe('board_corrupted');
    expect(command.getErrorMessage()).toBe('broken');
    expect(connection.reconciler.isSynced()).toBe(false);

    socket.fire('session_snapshot', { session_id: 'room-1', state: encodeSnapshot(fresh) });
    expect(connection.reconciler.getPositions()).toEqual({ a: [1, 1] });
  });

  it('does not rejoin a session that was ended', () => {
    connection.connect('room-1');
    const socket = currentSocket();
    socket.fire('connect');
    socket.fire('session_snapshot', { session_id: 'room-1', state: encodeSnapshot(snapshot) });

    socket.fire('session_reset', { session_id: 'room-1', code: 'session_ended', reason: 'Game over' });

    expect(socket.emitted('join_session')).toEqual([{ sessionId: 'room-1' }]);
    expect(connection.reconciler.isSynced()).toBe(false);
  });

  it('keeps its board when another session is reset', () => {
    connection.connect('room-1');
    const socket = currentSocket();
    socket.fire('connect');
    socket.fire('session_snapshot', { session_id: 'room-1', state: encodeSnapshot(snapshot) });

    socket.fire('session_reset', { session_id: 'room-9', code: 'board_corrupted', reason: 'broken' });

    expect(socket.emitted('join_session')).toEqual([{ sessionId: 'room-1' }]);
    expect(connection.reconciler.getVersion()).toBe(2);
  });

  it('reports connection failures', () => {
    connection.connect('room-1');
    const failure = new Error('refused');
    currentSocket().fire('connect_error', failure);

    expect(onError).toHaveBeenCalledWith(failure);
    expect(connection.status).toBe('disconnected');
  });

  it('leaves the session and closes the socket on disconnect', () => {
    connection.connect('room-1');
    const socket = currentSocket();
    socket.fire('connect');

    connection.disconnect();

    expect(socket.emitted('leave_session')).toEqual([{ sessionId: 'room-1' }]);
    expect(socket.disconnect).toHaveBeenCalledTimes(1);
    expect(connection.status).toBe('disconnected');
    expect(connection.sessionId).toBeNull();
    expect(connection.requestSnapshot()).toBe(false);
  });

  it('cannot submit before connecting', () => {
    const command = connection.tracker.create('resign', 'white_king');
    expect(() => connection.submit(command)).toThrow('Not connected');
    expect(command.status).toBe('created');
  });
});
