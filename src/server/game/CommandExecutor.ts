import type { ExecutionResult } from '../../shared/types/command';
import type { HandlerOutcome, PreparedCommand } from '../../shared/commands';
import { ExecutionError, isCommandError } from '../../shared/errors';
import type { AuthoritativeBoard, CommittedTransaction } from './AuthoritativeBoard';

export type Clock = () => number;

/**
 * Applies a validated command to the board inside a single transaction.
 *
 * On success the board has advanced by exactly one version and the returned
 * result describes the net change. On any failure the transaction is
 * discarded and an ExecutionError is thrown; the board is unchanged.
 */
export class CommandExecutor {
  constructor(private readonly clock: Clock = Date.now) {}

  execute(prepared: PreparedCommand, board: AuthoritativeBoard): ExecutionResult {
    const { command } = prepared;

    let committed: CommittedTransaction<HandlerOutcome>;
    try {
      committed = board.transact((tx) => {
        const actorCell = tx.positionOf(command.pieceId);
        if (actorCell === undefined) {
          throw new Error(`Piece ${command.pieceId} vanished before execution`);
        }
        return prepared.apply(actorCell, tx);
      });
    } catch (error) {
      if (error instanceof ExecutionError) {
        throw error;
      }
      throw new ExecutionError(
        `Failed to execute ${command.kind} for ${command.pieceId}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        {
          pieceId: command.pieceId,
          kind: command.kind,
          timestamp: command.timestamp,
          cause: isCommandError(error) ? error.code : error instanceof Error ? error.name : typeof error,
        }
      );
    }

    const outcome = committed.value;
    const result: ExecutionResult = {
      kind: prepared.resultKind,
      pieceId: command.pieceId,
      changes: committed.changes,
      details: outcome.details ?? {},
      version: committed.version,
      committedAt: this.clock(),
    };
    if (outcome.from) {
      result.from = outcome.from;
    }
    if (outcome.to) {
      result.to = outcome.to;
    }
    if (committed.phaseChanged) {
      result.phase = committed.phase;
    }
    return result;
  }
}
