import { CommandSessionManager, type IncomingResult } from '../../src/server/game/CommandSessionManager';
import type { Transport } from '../../src/server/game/SessionBroadcaster';
import type { ServerDelivery } from '../../src/shared/types/websocket';
import { CommandLifecycleTracker } from '../../src/client/commands/CommandLifecycleTracker';
import { StateReconciler } from '../../src/client/sync/StateReconciler';
import { smallBoard, recordingLogger } from '../helpers/commandTestUtils';

/**
 * Routes `message` deliveries straight into the tracker registered for the
 * connection. Connections listed in `dropNext` lose their next message.
 */
class LoopbackTransport implements Transport {
  readonly dropNext = new Set<string>();
  private readonly trackers = new Map<string, CommandLifecycleTracker>();

  attach(connectionId: string, tracker: CommandLifecycleTracker): void {
    this.trackers.set(connectionId, tracker);
  }

  deliver(connectionId: string, delivery: ServerDelivery): void {
    if (delivery.event !== 'message') {
      return;
    }
    if (this.dropNext.delete(connectionId)) {
      return;
    }
    this.trackers.get(connectionId)?.handleIncoming(delivery.payload);
  }
}

interface TestClient {
  tracker: CommandLifecycleTracker;
  reconciler: StateReconciler;
  readonly resyncRequests: number;
}

describe('command pipeline end to end', () => {
  let transport: LoopbackTransport;
  let manager: CommandSessionManager;
  let inFlight: Array<Promise<IncomingResult>>;

  function connect(connectionId: string, clientId: string): TestClient {
    const logger = recordingLogger();
    const resync = { count: 0 };
    const reconciler = new StateReconciler({
      logger,
      onResyncRequired: () => {
        resync.count += 1;
      },
    });
    const tracker = new CommandLifecycleTracker({
      clientId,
      sessionId: 'room-1',
      reconciler,
      logger,
      clock: () => 1_000,
      sender: {
        send: (envelope) => {
          inFlight.push(manager.handleIncoming(envelope, connectionId));
        },
      },
    });
    transport.attach(connectionId, tracker);
    reconciler.applySnapshot(manager.join('room-1', connectionId).snapshot);
    return {
      tracker,
      reconciler,
      get resyncRequests() {
        return resync.count;
      },
    };
  }

  async function settle(): Promise<IncomingResult[]> {
    const results = await Promise.all(inFlight);
    inFlight = [];
    return results;
  }

  beforeEach(() => {
    transport = new LoopbackTransport();
    manager = new CommandSessionManager({
      transport,
      boardFactory: () => smallBoard(),
      clock: () => 2_000,
    });
    inFlight = [];
  });

  it('confirms an accepted move and brings every mirror to the new version', async () => {
    const alice = connect('conn-a', 'alice');
    const bob = connect('conn-b', 'bob');

    const move = alice.tracker.create('move', 'white_pawn', [
      [6, 4],
      [4, 4],
    ]);
    alice.tracker.send(move);
    await expect(settle()).resolves.toEqual([{ status: 'accepted', version: 1 }]);

    expect(move.status).toBe('confirmed');
    expect(move.getExecutionResult()?.version).toBe(1);
    expect(alice.tracker.pendingCount).toBe(0);
    for (const client of [alice, bob]) {
      expect(client.reconciler.getVersion()).toBe(1);
      expect(client.reconciler.getPiecePosition('white_pawn')).toEqual([4, 4]);
    }
    expect(bob.reconciler.getPositions()).toEqual(manager.getSnapshot('room-1')?.positions);
  });

  it('rejects a stale command without touching anyone else', async () => {
    const alice = connect('conn-a', 'alice');
    const bob = connect('conn-b', 'bob');

    const move = bob.tracker.create('move', 'black_pawn', [
      [2, 3],
      [3, 3],
    ]);
    bob.tracker.send(move);
    await settle();

    expect(move.status).toBe('rejected');
    expect(move.getErrorCode()).toBe('stale_state');
    expect(move.getErrorMessage()).toBe('Piece black_pawn is at (1,3), not (2,3)');
    expect(alice.reconciler.getVersion()).toBe(0);
    expect(bob.reconciler.getPiecePosition('black_pawn')).toEqual([1, 3]);
  });

  it('lets the first of two racing commands win the contested cell', async () => {
    const alice = connect('conn-a', 'alice');
    const bob = connect('conn-b', 'bob');

    const aliceMove = alice.tracker.create('move', 'white_pawn', [
      [6, 4],
      [4, 4],
    ]);
    const bobMove = bob.tracker.create('move', 'black_pawn', [
      [1, 3],
      [4, 4],
    ]);
    alice.tracker.send(aliceMove);
    bob.tracker.send(bobMove);
    const results = await settle();

    expect(results[0]).toEqual({ status: 'accepted', version: 1 });
    expect(results[1]).toMatchObject({ status: 'rejected', code: 'cell_occupied' });
    expect(aliceMove.status).toBe('confirmed');
    expect(bobMove.getErrorMessage()).toBe('Cell (4,4) is occupied by white_pawn');
    expect(bob.reconciler.getPieceAt([4, 4])).toBe('white_pawn');
  });

  it('recovers from a lost broadcast through a snapshot', async () => {
    const alice = connect('conn-a', 'alice');
    const bob = connect('conn-b', 'bob');

    transport.dropNext.add('conn-b');
    alice.tracker.send(
      alice.tracker.create('move', 'white_pawn', [
        [6, 4],
        [5, 4],
      ])
    );
    await settle();
    alice.tracker.send(
      alice.tracker.create('move', 'white_king', [
        [7, 4],
        [6, 4],
      ])
    );
    await settle();

    expect(bob.reconciler.getVersion()).toBe(0);
    expect(bob.resyncRequests).toBe(1);
    expect(bob.reconciler.isResyncPending()).toBe(true);

    const snapshot = manager.getSnapshot('room-1');
    expect(snapshot?.version).toBe(2);
    if (snapshot) {
      expect(bob.reconciler.applySnapshot(snapshot)).toBe(true);
    }
    expect(bob.reconciler.getPositions()).toEqual(alice.reconciler.getPositions());
    expect(bob.reconciler.isResyncPending()).toBe(false);
  });
});
