import type {
  BoardBounds,
  BoardSnapshot,
  Cell,
  PositionChange,
  SessionPhase,
  WebSocketMessage,
} from '../../shared/types/command';
import { cellsEqual } from '../../shared/types/command';
import { readBroadcastResult } from '../../shared/codec/envelopeCodec';
import { StaleStateError } from '../../shared/errors';
import { consoleLogger, type ClientLogger } from '../utils/clientLogger';

export type ReconcileUpdate =
  | { type: 'delta'; changes: PositionChange[]; phase?: SessionPhase }
  | { type: 'snapshot'; snapshot: BoardSnapshot };

export interface StateReconcilerOptions {
  /** Called once per detected gap; a later snapshot clears it. */
  onResyncRequired?: (error: StaleStateError) => void;
  logger?: ClientLogger;
}

const copyCell = (cell: Cell): Cell => [cell[0], cell[1]];

/**
 * Client-side mirror of the authoritative board, advanced only in version
 * order. Deltas must arrive exactly one version ahead; anything older is stale
 * and ignored, anything further ahead is a gap that requires a snapshot.
 */
export class StateReconciler {
  private version = 0;
  private positions = new Map<string, Cell>();
  private phase: SessionPhase = { kind: 'active' };
  private bounds: BoardBounds | null = null;
  private synced = false;
  private resyncPending = false;
  private readonly onResyncRequired: ((error: StaleStateError) => void) | null;
  private readonly logger: ClientLogger;

  constructor(options: StateReconcilerOptions = {}) {
    this.onResyncRequired = options.onResyncRequired ?? null;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Returns true when the update was applied.
   */
  reconcile(update: ReconcileUpdate, incomingVersion: number): boolean {
    if (update.type === 'snapshot') {
      return this.reconcileSnapshot(update.snapshot, incomingVersion);
    }

    if (incomingVersion <= this.version) {
      this.logger.debug('Ignoring stale delta', { localVersion: this.version, incomingVersion });
      return false;
    }

    if (incomingVersion > this.version + 1) {
      const error = new StaleStateError(this.version, incomingVersion);
      this.logger.warn('Version gap detected, resync required', {
        localVersion: this.version,
        incomingVersion,
      });
      if (!this.resyncPending) {
        this.resyncPending = true;
        this.onResyncRequired?.(error);
      }
      return false;
    }

    for (const change of update.changes) {
      if (change.to === null) {
        this.positions.delete(change.pieceId);
      } else {
        this.positions.set(change.pieceId, copyCell(change.to));
      }
    }
    if (update.phase) {
      this.phase = { ...update.phase };
    }
    this.version = incomingVersion;
    return true;
  }

  applyBroadcast(message: WebSocketMessage): boolean {
    const result = readBroadcastResult(message);
    return this.reconcile(
      { type: 'delta', changes: result.changes, ...(result.phase ? { phase: result.phase } : {}) },
      result.version
    );
  }

  applySnapshot(snapshot: BoardSnapshot): boolean {
    return this.reconcile({ type: 'snapshot', snapshot }, snapshot.version);
  }

  private reconcileSnapshot(snapshot: BoardSnapshot, incomingVersion: number): boolean {
    // The first snapshot is always taken, even at version 0.
    if (this.synced && incomingVersion <= this.version) {
      this.logger.debug('Ignoring stale snapshot', { localVersion: this.version, incomingVersion });
      return false;
    }

    this.positions = new Map(
      Object.entries(snapshot.positions).map(([pieceId, cell]): [string, Cell] => [pieceId, copyCell(cell)])
    );
    this.phase = { ...snapshot.phase };
    this.bounds = { ...snapshot.bounds };
    this.version = incomingVersion;
    this.synced = true;
    this.resyncPending = false;
    return true;
  }

  /**
   * Forget the mirrored board. The next snapshot is taken whatever its
   * version, as on first sync.
   */
  reset(): void {
    this.version = 0;
    this.positions = new Map();
    this.phase = { kind: 'active' };
    this.bounds = null;
    this.synced = false;
    this.resyncPending = false;
  }

  getVersion(): number {
    return this.version;
  }

  getPositions(): Record<string, Cell> {
    return Object.fromEntries(
      Array.from(this.positions, ([pieceId, cell]): [string, Cell] => [pieceId, copyCell(cell)])
    );
  }

  getPiecePosition(pieceId: string): Cell | undefined {
    const cell = this.positions.get(pieceId);
    return cell ? copyCell(cell) : undefined;
  }

  getPieceAt(cell: Cell): string | undefined {
    for (const [pieceId, position] of this.positions) {
      if (cellsEqual(position, cell)) {
        return pieceId;
      }
    }
    return undefined;
  }

  getPhase(): SessionPhase {
    return { ...this.phase };
  }

  getBounds(): BoardBounds | null {
    return this.bounds ? { ...this.bounds } : null;
  }

  isSynced(): boolean {
    return this.synced;
  }

  isResyncPending(): boolean {
    return this.resyncPending;
  }
}
