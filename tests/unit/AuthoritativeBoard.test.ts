import {
  AuthoritativeBoard,
  diffPositions,
  findInvariantViolation,
} from '../../src/server/game/AuthoritativeBoard';
import type { Cell } from '../../src/shared/types/command';
import { BoardCorruptionError, ExecutionError } from '../../src/shared/errors';
import { smallBoard } from '../helpers/commandTestUtils';

describe('AuthoritativeBoard', () => {
  describe('construction', () => {
    it('starts an empty board at version 0 in the active phase', () => {
      const board = AuthoritativeBoard.createEmpty(4, 3);
      expect(board.version).toBe(0);
      expect(board.pieceCount).toBe(0);
      expect(board.phase).toEqual({ kind: 'active' });
      expect(board.bounds).toEqual({ width: 4, height: 3 });
    });

    it('refuses a snapshot with two pieces on one cell', () => {
      expect(() =>
        AuthoritativeBoard.fromSnapshot({
          positions: { a: [1, 1], b: [1, 1] },
          bounds: { width: 3, height: 3 },
          phase: { kind: 'active' },
          version: 0,
        })
      ).toThrow(new BoardCorruptionError('Pieces a and b share cell (1,1)'));
    });

    it('refuses a snapshot with a piece off the board', () => {
      expect(() =>
        AuthoritativeBoard.fromSnapshot({
          positions: { a: [3, 0] },
          bounds: { width: 3, height: 3 },
          phase: { kind: 'active' },
          version: 0,
        })
      ).toThrow('Piece a at (3,0) is outside the 3x3 board');
    });

    it('copies the positions it is given', () => {
      const positions: Record<string, Cell> = { a: [0, 0] };
      const board = new AuthoritativeBoard({ bounds: { width: 2, height: 2 }, positions });
      positions.a[0] = 1;
      expect(board.positionOf('a')).toEqual([0, 0]);
    });
  });

  describe('queries', () => {
    const board = smallBoard();

    it('looks pieces up by id and by cell', () => {
      expect(board.hasPiece('white_king')).toBe(true);
      expect(board.hasPiece('ghost')).toBe(false);
      expect(board.positionOf('white_pawn')).toEqual([6, 4]);
      expect(board.pieceAt([0, 4])).toBe('black_king');
      expect(board.pieceAt([3, 3])).toBeUndefined();
    });

    it('checks bounds as 0 <= row < height and 0 <= col < width', () => {
      expect(board.isWithinBounds([0, 0])).toBe(true);
      expect(board.isWithinBounds([7, 7])).toBe(true);
      expect(board.isWithinBounds([8, 0])).toBe(false);
      expect(board.isWithinBounds([0, -1])).toBe(false);
    });

    it('returns copies that cannot change the board', () => {
      const cell = board.positionOf('white_king');
      expect(cell).toBeDefined();
      if (cell) {
        cell[0] = 0;
      }
      expect(board.positionOf('white_king')).toEqual([7, 4]);

      const snapshot = board.snapshot();
      snapshot.positions.white_king = [3, 3];
      expect(board.positionOf('white_king')).toEqual([7, 4]);
    });
  });

  describe('transact', () => {
    it('commits staged changes and advances the version by one', () => {
      const board = smallBoard();
      const committed = board.transact((tx) => {
        tx.movePiece('white_pawn', [4, 4]);
        return 'done';
      });

      expect(committed.value).toBe('done');
      expect(committed.version).toBe(1);
      expect(committed.changes).toEqual([{ pieceId: 'white_pawn', from: [6, 4], to: [4, 4] }]);
      expect(committed.phaseChanged).toBe(false);
      expect(board.version).toBe(1);
      expect(board.positionOf('white_pawn')).toEqual([4, 4]);
    });

    it('leaves the board untouched when the callback throws', () => {
      const board = smallBoard();
      expect(() =>
        board.transact((tx) => {
          tx.movePiece('white_pawn', [4, 4]);
          tx.removePiece('ghost');
        })
      ).toThrow('Piece ghost is not on the board');

      expect(board.version).toBe(0);
      expect(board.positionOf('white_pawn')).toEqual([6, 4]);
    });

    it('rejects a staged state that breaks an invariant with an ExecutionError', () => {
      const board = smallBoard();
      const attempt = () => board.transact((tx) => tx.movePiece('white_pawn', [7, 4]));

      expect(attempt).toThrow(ExecutionError);
      expect(attempt).toThrow('Staged state rejected: Pieces white_king and white_pawn share cell (7,4)');
      expect(board.version).toBe(0);
    });

    it('tolerates an overlap that is resolved before commit', () => {
      const board = smallBoard();
      board.transact((tx) => {
        tx.movePiece('white_king', [7, 7]);
        tx.movePiece('white_rook', [7, 5]);
      });
      expect(board.pieceAt([7, 7])).toBe('white_king');
      expect(board.pieceAt([7, 5])).toBe('white_rook');
    });

    it('reports phase changes', () => {
      const board = smallBoard();
      const committed = board.transact((tx) => tx.setPhase({ kind: 'draw_offered', offeredBy: 'white_king' }));
      expect(committed.phaseChanged).toBe(true);
      expect(board.phase).toEqual({ kind: 'draw_offered', offeredBy: 'white_king' });
    });

    it('renames a piece in place', () => {
      const board = smallBoard();
      const committed = board.transact((tx) => tx.renamePiece('white_pawn', 'white_queen'));
      expect(board.positionOf('white_queen')).toEqual([6, 4]);
      expect(board.hasPiece('white_pawn')).toBe(false);
      expect(committed.changes).toEqual([
        { pieceId: 'white_pawn', from: [6, 4], to: null },
        { pieceId: 'white_queen', from: null, to: [6, 4] },
      ]);
    });
  });

  describe('view', () => {
    it('does not see later commits', () => {
      const board = smallBoard();
      const view = board.view();
      board.transact((tx) => tx.movePiece('white_pawn', [5, 4]));

      expect(view.version).toBe(0);
      expect(view.positionOf('white_pawn')).toEqual([6, 4]);
      expect(board.positionOf('white_pawn')).toEqual([5, 4]);
    });
  });

  describe('assertInvariants', () => {
    it('throws a fatal error for a board built around a corrupt state', () => {
      const board = new AuthoritativeBoard({
        bounds: { width: 2, height: 2 },
        positions: { a: [0, 0], b: [0, 0] },
      });

      expect(() => board.assertInvariants()).toThrow(BoardCorruptionError);
      try {
        board.assertInvariants();
      } catch (error) {
        expect(error).toMatchObject({ isFatal: true, code: 'board_corrupted' });
      }
    });
  });

  describe('helpers', () => {
    it('findInvariantViolation flags negative versions and bad bounds', () => {
      expect(findInvariantViolation(new Map(), { width: 2, height: 2 }, -1)).toBe(
        'Version -1 is not a non-negative integer'
      );
      expect(findInvariantViolation(new Map(), { width: 0, height: 2 }, 0)).toBe('Bounds 0x2 are invalid');
      expect(findInvariantViolation(new Map(), { width: 2, height: 2 }, 0)).toBeNull();
    });

    it('diffPositions lists moves and removals before additions', () => {
      const before = new Map<string, Cell>([
        ['a', [0, 0]],
        ['b', [1, 1]],
        ['c', [2, 2]],
      ]);
      const after = new Map<string, Cell>([
        ['d', [3, 3]],
        ['a', [0, 1]],
        ['c', [2, 2]],
      ]);
      expect(diffPositions(before, after)).toEqual([
        { pieceId: 'a', from: [0, 0], to: [0, 1] },
        { pieceId: 'b', from: [1, 1], to: null },
        { pieceId: 'd', from: null, to: [3, 3] },
      ]);
    });
  });
});
