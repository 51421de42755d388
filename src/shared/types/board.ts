import type { BoardBounds, Cell, SessionPhase } from './command';

/**
 * Read-only view of a board. Handed to validators, kind preconditions and the
 * rule resolver; none of them can mutate through it.
 */
export interface BoardView {
  readonly bounds: BoardBounds;
  readonly version: number;
  readonly phase: SessionPhase;
  hasPiece(pieceId: string): boolean;
  positionOf(pieceId: string): Cell | undefined;
  pieceAt(cell: Cell): string | undefined;
  isWithinBounds(cell: Cell): boolean;
  pieceIds(): string[];
}

/**
 * Staging surface used by command handlers inside `AuthoritativeBoard.transact`.
 *
 * Mutations apply to a private copy. Intermediate states may temporarily put two
 * pieces on one cell (a castle moves king then rook); invariants are checked once,
 * at commit.
 */
export interface BoardTransaction extends BoardView {
  movePiece(pieceId: string, to: Cell): void;
  removePiece(pieceId: string): void;
  renamePiece(pieceId: string, nextId: string): void;
  setPhase(phase: SessionPhase): void;
}
