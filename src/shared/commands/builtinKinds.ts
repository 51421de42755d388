import { z } from 'zod';
import { cellsEqual, formatCell, type Cell } from '../types/command';
import type { BoardView } from '../types/board';
import { CommandErrorCode } from '../errors';
import { CellSchema } from '../validation/commandSchemas';
import {
  CommandKindRegistry,
  defineCommandKind,
  type CommandKindHandler,
  type KindContext,
  type PreconditionFailure,
} from './CommandKindRegistry';

// ═══════════════════════════════════════════════════════════════════════════
// PARAM SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const FromToParamsSchema = z.tuple([CellSchema, CellSchema]);
type FromToParams = z.infer<typeof FromToParamsSchema>;

const TargetParamsSchema = z.tuple([CellSchema]);
type TargetParams = z.infer<typeof TargetParamsSchema>;

const CastleParamsSchema = z.tuple([
  z.enum(['kingside', 'queenside']),
  z.string().min(1),
  CellSchema,
  CellSchema,
]);
type CastleParams = z.infer<typeof CastleParamsSchema>;

const PromoteParamsSchema = z.tuple([z.string().min(1)]);
type PromoteParams = z.infer<typeof PromoteParamsSchema>;

const NoParamsSchema = z.tuple([]);
type NoParams = z.infer<typeof NoParamsSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// SHARED PRECONDITIONS
// ═══════════════════════════════════════════════════════════════════════════

function requireAt(pieceId: string, actorCell: Cell, expected: Cell): PreconditionFailure | null {
  if (cellsEqual(actorCell, expected)) {
    return null;
  }
  return {
    code: CommandErrorCode.STALE_STATE,
    message: `Piece ${pieceId} is at ${formatCell(actorCell)}, not ${formatCell(expected)}`,
  };
}

function requireEmpty(view: BoardView, cell: Cell, ignore: readonly string[] = []): PreconditionFailure | null {
  const occupant = view.pieceAt(cell);
  if (occupant === undefined || ignore.includes(occupant)) {
    return null;
  }
  return {
    code: CommandErrorCode.CELL_OCCUPIED,
    message: `Cell ${formatCell(cell)} is occupied by ${occupant}`,
  };
}

function translation(
  { command, params, actorCell }: KindContext<FromToParams>,
  view: BoardView
): PreconditionFailure | null {
  const [from, to] = params;
  if (cellsEqual(from, to)) {
    return {
      code: CommandErrorCode.INVALID_TARGET,
      message: `Source and destination are the same cell ${formatCell(from)}`,
    };
  }
  return requireAt(command.pieceId, actorCell, from) ?? requireEmpty(view, to);
}

// ═══════════════════════════════════════════════════════════════════════════
// BUILT-IN KINDS
// ═══════════════════════════════════════════════════════════════════════════

export const moveKind = defineCommandKind<FromToParams>({
  kind: 'move',
  paramsSchema: FromToParamsSchema,
  referencedCells: ([from, to]) => [from, to],
  precondition: translation,
  apply({ command, params: [from, to] }, tx) {
    tx.movePiece(command.pieceId, to);
    return { from, to };
  },
});

/** Same board effect as `move`; kept distinct so rule resolvers can tell them apart. */
export const jumpKind = defineCommandKind<FromToParams>({
  kind: 'jump',
  paramsSchema: FromToParamsSchema,
  referencedCells: ([from, to]) => [from, to],
  precondition: translation,
  apply({ command, params: [from, to] }, tx) {
    tx.movePiece(command.pieceId, to);
    return { from, to };
  },
});

/**
 * Strike a cell without moving. Whatever stands there is removed; an empty
 * target is still a valid (if pointless) attack.
 */
export const attackKind = defineCommandKind<TargetParams>({
  kind: 'attack',
  paramsSchema: TargetParamsSchema,
  referencedCells: ([target]) => [target],
  precondition({ params: [target], actorCell }) {
    if (cellsEqual(target, actorCell)) {
      return {
        code: CommandErrorCode.INVALID_TARGET,
        message: `A piece cannot attack its own cell ${formatCell(target)}`,
      };
    }
    return null;
  },
  apply({ params: [target], actorCell }, tx) {
    const victim = tx.pieceAt(target);
    if (victim !== undefined) {
      tx.removePiece(victim);
    }
    return {
      from: actorCell,
      to: target,
      details: { target_piece: victim ?? null, captured: victim !== undefined },
    };
  },
});

export const captureKind = defineCommandKind<FromToParams>({
  kind: 'capture',
  paramsSchema: FromToParamsSchema,
  referencedCells: ([from, to]) => [from, to],
  precondition({ command, params: [from, to], actorCell }, view) {
    const stale = requireAt(command.pieceId, actorCell, from);
    if (stale) {
      return stale;
    }
    const victim = view.pieceAt(to);
    if (victim === undefined || victim === command.pieceId) {
      return {
        code: CommandErrorCode.INVALID_TARGET,
        message: `No piece to capture at ${formatCell(to)}`,
      };
    }
    return null;
  },
  apply({ command, params: [from, to] }, tx) {
    const victim = tx.pieceAt(to);
    if (victim === undefined) {
      throw new Error(`Capture target at ${formatCell(to)} disappeared`);
    }
    tx.removePiece(victim);
    tx.movePiece(command.pieceId, to);
    return { from, to, details: { captured_piece: victim } };
  },
});

/**
 * `[side, rook_id, king_to, rook_to]`. The acting piece is the king; both
 * pieces move in the same transaction.
 */
export const castleKind = defineCommandKind<CastleParams>({
  kind: 'castle',
  paramsSchema: CastleParamsSchema,
  referencedCells: ([, , kingTo, rookTo]) => [kingTo, rookTo],
  precondition({ command, params: [, rookId, kingTo, rookTo] }, view) {
    if (rookId === command.pieceId) {
      return { code: CommandErrorCode.INVALID_TARGET, message: 'A piece cannot castle with itself' };
    }
    if (!view.hasPiece(rookId)) {
      return { code: CommandErrorCode.INVALID_TARGET, message: `Rook ${rookId} is not on the board` };
    }
    if (cellsEqual(kingTo, rookTo)) {
      return {
        code: CommandErrorCode.INVALID_TARGET,
        message: `King and rook cannot both land on ${formatCell(kingTo)}`,
      };
    }
    const movers = [command.pieceId, rookId];
    return requireEmpty(view, kingTo, movers) ?? requireEmpty(view, rookTo, movers);
  },
  apply({ command, params: [side, rookId, kingTo, rookTo], actorCell }, tx) {
    const rookFrom = tx.positionOf(rookId);
    if (rookFrom === undefined) {
      throw new Error(`Rook ${rookId} disappeared`);
    }
    tx.movePiece(command.pieceId, kingTo);
    tx.movePiece(rookId, rookTo);
    return {
      from: actorCell,
      to: kingTo,
      details: { side, rook_id: rookId, rook_from: rookFrom, rook_to: rookTo },
    };
  },
});

/** Replace the acting piece's id in place, e.g. `pawn_a7` becomes `queen_a8`. */
export const promoteKind = defineCommandKind<PromoteParams>({
  kind: 'promote',
  paramsSchema: PromoteParamsSchema,
  referencedCells: () => [],
  precondition({ command, params: [promotedId] }, view) {
    if (promotedId === command.pieceId) {
      return {
        code: CommandErrorCode.INVALID_TARGET,
        message: `Piece ${promotedId} cannot be promoted to itself`,
      };
    }
    if (view.hasPiece(promotedId)) {
      return {
        code: CommandErrorCode.INVALID_TARGET,
        message: `Piece id ${promotedId} is already on the board`,
      };
    }
    return null;
  },
  apply({ command, params: [promotedId], actorCell }, tx) {
    tx.renamePiece(command.pieceId, promotedId);
    return { from: actorCell, to: actorCell, details: { promoted_to: promotedId } };
  },
});

export const resignKind = defineCommandKind<NoParams>({
  kind: 'resign',
  paramsSchema: NoParamsSchema,
  referencedCells: () => [],
  apply({ command }, tx) {
    tx.setPhase({ kind: 'finished', reason: 'resignation', pieceId: command.pieceId });
    return {};
  },
});

export const drawOfferKind = defineCommandKind<NoParams>({
  kind: 'draw_offer',
  paramsSchema: NoParamsSchema,
  referencedCells: () => [],
  precondition(_context, view) {
    if (view.phase.kind === 'draw_offered') {
      return {
        code: CommandErrorCode.INVALID_TARGET,
        message: `A draw offer by ${view.phase.offeredBy} is already pending`,
      };
    }
    return null;
  },
  apply({ command }, tx) {
    tx.setPhase({ kind: 'draw_offered', offeredBy: command.pieceId });
    return {};
  },
});

export const drawAcceptKind = defineCommandKind<NoParams>({
  kind: 'draw_accept',
  paramsSchema: NoParamsSchema,
  referencedCells: () => [],
  precondition({ command }, view) {
    if (view.phase.kind !== 'draw_offered') {
      return { code: CommandErrorCode.NO_PENDING_OFFER, message: 'There is no draw offer to accept' };
    }
    if (view.phase.offeredBy === command.pieceId) {
      return {
        code: CommandErrorCode.INVALID_TARGET,
        message: `Piece ${command.pieceId} cannot accept its own draw offer`,
      };
    }
    return null;
  },
  apply({ command }, tx) {
    const offeredBy = tx.phase.kind === 'draw_offered' ? tx.phase.offeredBy : null;
    tx.setPhase({ kind: 'finished', reason: 'draw_agreed', pieceId: command.pieceId });
    return { details: { offered_by: offeredBy } };
  },
});

export const drawDeclineKind = defineCommandKind<NoParams>({
  kind: 'draw_decline',
  paramsSchema: NoParamsSchema,
  referencedCells: () => [],
  precondition(_context, view) {
    if (view.phase.kind !== 'draw_offered') {
      return { code: CommandErrorCode.NO_PENDING_OFFER, message: 'There is no draw offer to decline' };
    }
    return null;
  },
  apply(_context, tx) {
    const offeredBy = tx.phase.kind === 'draw_offered' ? tx.phase.offeredBy : null;
    tx.setPhase({ kind: 'active' });
    return { details: { offered_by: offeredBy } };
  },
});

export const BUILTIN_KIND_HANDLERS: readonly CommandKindHandler[] = [
  moveKind,
  jumpKind,
  attackKind,
  captureKind,
  castleKind,
  promoteKind,
  resignKind,
  drawOfferKind,
  drawAcceptKind,
  drawDeclineKind,
];

/**
 * Registry pre-loaded with the built-in kinds. Callers add their own with
 * `register()`.
 */
export function createDefaultRegistry(): CommandKindRegistry {
  const registry = new CommandKindRegistry();
  for (const handler of BUILTIN_KIND_HANDLERS) {
    registry.register(handler);
  }
  return registry;
}
