import { formatCell, type Cell, type CommandData } from '../../shared/types/command';
import type { BoardView } from '../../shared/types/board';
import type { CommandKindRegistry, PreparedCommand } from '../../shared/commands';
import { CommandErrorCode } from '../../shared/errors';
import type { RuleResolver } from './RuleResolver';

export type ValidationStage = 'structure' | 'existence' | 'bounds' | 'state' | 'rules';

export type ValidationResult =
  | { valid: true; prepared: PreparedCommand; actorCell: Cell }
  | { valid: false; stage: ValidationStage; code: CommandErrorCode; reason: string };

type Rejection = Extract<ValidationResult, { valid: false }>;

const reject = (stage: ValidationStage, code: CommandErrorCode, reason: string): Rejection => ({
  valid: false,
  stage,
  code,
  reason,
});

/**
 * Decides whether a command may be applied to the current board. Checks run in
 * a fixed order and stop at the first failure:
 *
 * 1. structure - known kind, params match the kind's schema
 * 2. existence - the acting piece is on the board
 * 3. bounds - every referenced cell is on the board
 * 3b. state - session not finished, kind precondition holds
 * 4. rules - the pluggable rule resolver agrees
 *
 * Never mutates the board.
 */
export class CommandValidator {
  constructor(
    private readonly registry: CommandKindRegistry,
    private readonly ruleResolver: RuleResolver
  ) {}

  validate(command: CommandData, board: BoardView): ValidationResult {
    // 1. Structure
    const preparation = this.registry.prepare(command);
    if (!preparation.ok) {
      return reject('structure', preparation.code, preparation.message);
    }
    const { prepared } = preparation;

    // 2. Existence
    const actorCell = board.positionOf(command.pieceId);
    if (actorCell === undefined) {
      return reject('existence', CommandErrorCode.PIECE_NOT_FOUND, `Piece ${command.pieceId} not found`);
    }

    // 3. Bounds
    for (const cell of prepared.referencedCells) {
      if (!board.isWithinBounds(cell)) {
        return reject(
          'bounds',
          CommandErrorCode.OUT_OF_BOUNDS,
          `Cell ${formatCell(cell)} is outside the ${board.bounds.width}x${board.bounds.height} board`
        );
      }
    }

    // 3b. State consistency
    const phase = board.phase;
    if (phase.kind === 'finished') {
      return reject(
        'state',
        CommandErrorCode.SESSION_FINISHED,
        `Session is finished (${phase.reason === 'resignation' ? 'resignation' : 'draw agreed'} by ${phase.pieceId})`
      );
    }
    const failure = prepared.checkPrecondition(actorCell, board);
    if (failure) {
      return reject('state', failure.code, failure.message);
    }

    // 4. Rules
    const verdict = this.ruleResolver.isLegal({
      kind: command.kind,
      pieceId: command.pieceId,
      params: command.params,
      timestamp: command.timestamp,
      actorCell,
      board,
    });
    if (!verdict.legal) {
      return reject('rules', CommandErrorCode.RULE_REJECTED, verdict.reason ?? `Rule resolver rejected ${command.kind}`);
    }

    return { valid: true, prepared, actorCell };
  }
}
