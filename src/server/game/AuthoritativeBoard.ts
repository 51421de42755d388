import {
  cellKey,
  formatCell,
  type BoardBounds,
  type BoardSnapshot,
  type Cell,
  type PositionChange,
  type SessionPhase,
} from '../../shared/types/command';
import type { BoardTransaction, BoardView } from '../../shared/types/board';
import { BoardCorruptionError, ExecutionError } from '../../shared/errors';
import type { BoardLayout } from './layouts';

/**
 * AuthoritativeBoard - the server's single source of truth for one session.
 *
 * State: piece positions, board bounds, session phase and a monotonically
 * increasing version. Every accepted command advances the version by exactly
 * one. All mutation goes through {@link AuthoritativeBoard.transact}, which
 * stages changes on a private copy and swaps it in only when the staged state
 * satisfies the board invariants:
 *
 * - version is a non-negative integer
 * - every position is inside the bounds
 * - no two pieces share a cell
 */

const copyCell = (cell: Cell): Cell => [cell[0], cell[1]];

function copyPhase(phase: SessionPhase): SessionPhase {
  return { ...phase };
}

function phasesEqual(a: SessionPhase, b: SessionPhase): boolean {
  switch (a.kind) {
    case 'active':
      return b.kind === 'active';
    case 'draw_offered':
      return b.kind === 'draw_offered' && a.offeredBy === b.offeredBy;
    case 'finished':
      return b.kind === 'finished' && a.reason === b.reason && a.pieceId === b.pieceId;
  }
}

export function isCellWithinBounds(cell: Cell, bounds: BoardBounds): boolean {
  const [row, col] = cell;
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    col >= 0 &&
    row < bounds.height &&
    col < bounds.width
  );
}

/**
 * Returns a description of the first violated invariant, or null.
 */
export function findInvariantViolation(
  positions: ReadonlyMap<string, Cell>,
  bounds: BoardBounds,
  version: number
): string | null {
  if (!Number.isInteger(version) || version < 0) {
    return `Version ${version} is not a non-negative integer`;
  }
  if (!Number.isInteger(bounds.width) || !Number.isInteger(bounds.height) || bounds.width < 1 || bounds.height < 1) {
    return `Bounds ${bounds.width}x${bounds.height} are invalid`;
  }

  const occupied = new Map<string, string>();
  for (const [pieceId, cell] of positions) {
    if (pieceId.length === 0) {
      return 'A piece has an empty id';
    }
    if (!isCellWithinBounds(cell, bounds)) {
      return `Piece ${pieceId} at ${formatCell(cell)} is outside the ${bounds.width}x${bounds.height} board`;
    }
    const key = cellKey(cell);
    const other = occupied.get(key);
    if (other !== undefined) {
      return `Pieces ${other} and ${pieceId} share cell ${formatCell(cell)}`;
    }
    occupied.set(key, pieceId);
  }
  return null;
}

/**
 * Read-only view over a private copy of board state.
 */
class DetachedBoardView implements BoardView {
  constructor(
    protected readonly positionMap: Map<string, Cell>,
    readonly bounds: BoardBounds,
    protected currentPhase: SessionPhase,
    readonly version: number
  ) {}

  get phase(): SessionPhase {
    return copyPhase(this.currentPhase);
  }

  hasPiece(pieceId: string): boolean {
    return this.positionMap.has(pieceId);
  }

  positionOf(pieceId: string): Cell | undefined {
    const cell = this.positionMap.get(pieceId);
    return cell ? copyCell(cell) : undefined;
  }

  pieceAt(cell: Cell): string | undefined {
    const key = cellKey(cell);
    for (const [pieceId, position] of this.positionMap) {
      if (cellKey(position) === key) {
        return pieceId;
      }
    }
    return undefined;
  }

  isWithinBounds(cell: Cell): boolean {
    return isCellWithinBounds(cell, this.bounds);
  }

  pieceIds(): string[] {
    return Array.from(this.positionMap.keys());
  }
}

class StagedBoard extends DetachedBoardView implements BoardTransaction {
  private requirePiece(pieceId: string): void {
    if (!this.positionMap.has(pieceId)) {
      throw new Error(`Piece ${pieceId} is not on the board`);
    }
  }

  movePiece(pieceId: string, to: Cell): void {
    this.requirePiece(pieceId);
    this.positionMap.set(pieceId, copyCell(to));
  }

  removePiece(pieceId: string): void {
    this.requirePiece(pieceId);
    this.positionMap.delete(pieceId);
  }

  renamePiece(pieceId: string, nextId: string): void {
    const cell = this.positionMap.get(pieceId);
    if (cell === undefined) {
      throw new Error(`Piece ${pieceId} is not on the board`);
    }
    if (this.positionMap.has(nextId)) {
      throw new Error(`Piece ${nextId} is already on the board`);
    }
    this.positionMap.delete(pieceId);
    this.positionMap.set(nextId, cell);
  }

  setPhase(phase: SessionPhase): void {
    this.currentPhase = copyPhase(phase);
  }

  stagedPositions(): Map<string, Cell> {
    return this.positionMap;
  }

  stagedPhase(): SessionPhase {
    return this.currentPhase;
  }
}

/**
 * Net position changes between two states; removals and moves in the order of
 * the original state, then additions.
 */
export function diffPositions(
  before: ReadonlyMap<string, Cell>,
  after: ReadonlyMap<string, Cell>
): PositionChange[] {
  const changes: PositionChange[] = [];
  for (const [pieceId, from] of before) {
    const to = after.get(pieceId);
    if (to === undefined) {
      changes.push({ pieceId, from: copyCell(from), to: null });
    } else if (cellKey(to) !== cellKey(from)) {
      changes.push({ pieceId, from: copyCell(from), to: copyCell(to) });
    }
  }
  for (const [pieceId, to] of after) {
    if (!before.has(pieceId)) {
      changes.push({ pieceId, from: null, to: copyCell(to) });
    }
  }
  return changes;
}

export interface CommittedTransaction<T> {
  value: T;
  changes: PositionChange[];
  phase: SessionPhase;
  phaseChanged: boolean;
  /** Version after the commit. */
  version: number;
}

export interface AuthoritativeBoardOptions {
  bounds: BoardBounds;
  positions?: Record<string, Cell>;
  phase?: SessionPhase;
  version?: number;
}

export class AuthoritativeBoard implements BoardView {
  readonly bounds: BoardBounds;
  private positions: Map<string, Cell>;
  private currentPhase: SessionPhase;
  private currentVersion: number;

  /**
   * Does not check invariants; use {@link AuthoritativeBoard.fromSnapshot} for
   * untrusted input.
   */
  constructor(options: AuthoritativeBoardOptions) {
    this.bounds = { width: options.bounds.width, height: options.bounds.height };
    this.positions = new Map(
      Object.entries(options.positions ?? {}).map(([pieceId, cell]): [string, Cell] => [pieceId, copyCell(cell)])
    );
    this.currentPhase = copyPhase(options.phase ?? { kind: 'active' });
    this.currentVersion = options.version ?? 0;
  }

  static createEmpty(width: number, height: number): AuthoritativeBoard {
    return AuthoritativeBoard.fromSnapshot({
      positions: {},
      bounds: { width, height },
      phase: { kind: 'active' },
      version: 0,
    });
  }

  static fromLayout(layout: BoardLayout): AuthoritativeBoard {
    return AuthoritativeBoard.fromSnapshot({
      positions: layout.pieces,
      bounds: layout.bounds,
      phase: { kind: 'active' },
      version: 0,
    });
  }

  /**
   * @throws BoardCorruptionError when the snapshot violates the invariants.
   */
  static fromSnapshot(snapshot: BoardSnapshot): AuthoritativeBoard {
    const board = new AuthoritativeBoard({
      bounds: snapshot.bounds,
      positions: snapshot.positions,
      phase: snapshot.phase,
      version: snapshot.version,
    });
    board.assertInvariants();
    return board;
  }

  get version(): number {
    return this.currentVersion;
  }

  get phase(): SessionPhase {
    return copyPhase(this.currentPhase);
  }

  get pieceCount(): number {
    return this.positions.size;
  }

  hasPiece(pieceId: string): boolean {
    return this.positions.has(pieceId);
  }

  positionOf(pieceId: string): Cell | undefined {
    const cell = this.positions.get(pieceId);
    return cell ? copyCell(cell) : undefined;
  }

  pieceAt(cell: Cell): string | undefined {
    const key = cellKey(cell);
    for (const [pieceId, position] of this.positions) {
      if (cellKey(position) === key) {
        return pieceId;
      }
    }
    return undefined;
  }

  isWithinBounds(cell: Cell): boolean {
    return isCellWithinBounds(cell, this.bounds);
  }

  pieceIds(): string[] {
    return Array.from(this.positions.keys());
  }

  /**
   * A detached read-only view; later commits do not show through it.
   */
  view(): BoardView {
    return new DetachedBoardView(this.copyPositions(), { ...this.bounds }, copyPhase(this.currentPhase), this.currentVersion);
  }

  snapshot(): BoardSnapshot {
    const positions: Record<string, Cell> = {};
    for (const [pieceId, cell] of this.positions) {
      positions[pieceId] = copyCell(cell);
    }
    return {
      positions,
      bounds: { ...this.bounds },
      phase: copyPhase(this.currentPhase),
      version: this.currentVersion,
    };
  }

  /**
   * @throws BoardCorruptionError (fatal) when any invariant is violated.
   */
  assertInvariants(): void {
    const violation = findInvariantViolation(this.positions, this.bounds, this.currentVersion);
    if (violation) {
      throw new BoardCorruptionError(violation, { version: this.currentVersion });
    }
  }

  /**
   * Run `fn` against a staged copy and commit it atomically, advancing the
   * version by one. If `fn` throws, or the staged state violates an invariant,
   * the board is left untouched.
   *
   * @throws whatever `fn` throws, or ExecutionError for an invariant violation
   */
  transact<T>(fn: (tx: BoardTransaction) => T): CommittedTransaction<T> {
    const staged = new StagedBoard(
      this.copyPositions(),
      { ...this.bounds },
      copyPhase(this.currentPhase),
      this.currentVersion
    );

    const value = fn(staged);

    const nextVersion = this.currentVersion + 1;
    const nextPositions = staged.stagedPositions();
    const violation = findInvariantViolation(nextPositions, this.bounds, nextVersion);
    if (violation) {
      throw new ExecutionError(`Staged state rejected: ${violation}`, {
        version: this.currentVersion,
      });
    }

    const nextPhase = staged.stagedPhase();
    const changes = diffPositions(this.positions, nextPositions);
    const phaseChanged = !phasesEqual(this.currentPhase, nextPhase);

    this.positions = nextPositions;
    this.currentPhase = nextPhase;
    this.currentVersion = nextVersion;

    return {
      value,
      changes,
      phase: copyPhase(nextPhase),
      phaseChanged,
      version: nextVersion,
    };
  }

  private copyPositions(): Map<string, Cell> {
    const copy = new Map<string, Cell>();
    for (const [pieceId, cell] of this.positions) {
      copy.set(pieceId, copyCell(cell));
    }
    return copy;
  }
}
