import type { z } from 'zod';
import type { Cell, CommandData, JsonValue } from '../types/command';
import type { BoardTransaction, BoardView } from '../types/board';
import { CommandErrorCode } from '../errors';

/**
 * Command kind registry.
 *
 * Every command kind (built-in or added at runtime) is described by a
 * {@link CommandKindDefinition}: a zod schema for its params, the cells those
 * params reference (for the bounds check), an optional state-consistency
 * precondition and the `apply` step that stages changes on a transaction.
 *
 * `defineCommandKind` erases the params type so that heterogeneous kinds can
 * live in one registry; each prepared command keeps its parsed params in a
 * closure.
 */

export type PreconditionCode =
  | CommandErrorCode.STALE_STATE
  | CommandErrorCode.CELL_OCCUPIED
  | CommandErrorCode.INVALID_TARGET
  | CommandErrorCode.NO_PENDING_OFFER;

export interface PreconditionFailure {
  code: PreconditionCode;
  message: string;
}

export interface KindContext<P> {
  command: CommandData;
  params: P;
  /** Where the acting piece currently stands. */
  actorCell: Cell;
}

export interface HandlerOutcome {
  from?: Cell;
  to?: Cell;
  details?: Record<string, JsonValue>;
}

export interface CommandKindDefinition<P> {
  kind: string;
  /** Result tag; defaults to `<kind>_executed`. */
  resultKind?: string;
  paramsSchema: z.ZodType<P>;
  referencedCells(params: P): Cell[];
  precondition?(context: KindContext<P>, view: BoardView): PreconditionFailure | null;
  apply(context: KindContext<P>, tx: BoardTransaction): HandlerOutcome;
}

export interface PreparedCommand {
  readonly command: CommandData;
  readonly resultKind: string;
  readonly referencedCells: readonly Cell[];
  checkPrecondition(actorCell: Cell, view: BoardView): PreconditionFailure | null;
  apply(actorCell: Cell, tx: BoardTransaction): HandlerOutcome;
}

export type PrepareOutcome =
  | { ok: true; prepared: PreparedCommand }
  | {
      ok: false;
      code: CommandErrorCode.UNKNOWN_KIND | CommandErrorCode.FORMAT_INVALID;
      message: string;
    };

export interface CommandKindHandler {
  readonly kind: string;
  readonly resultKind: string;
  prepare(command: CommandData): PrepareOutcome;
}

export function defineCommandKind<P>(definition: CommandKindDefinition<P>): CommandKindHandler {
  const resultKind = definition.resultKind ?? `${definition.kind}_executed`;

  return {
    kind: definition.kind,
    resultKind,
    prepare(command: CommandData): PrepareOutcome {
      const parsed = definition.paramsSchema.safeParse(command.params);
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((issue) => `${issue.path.length > 0 ? `params.${issue.path.join('.')}` : 'params'}: ${issue.message}`)
          .join('; ');
        return {
          ok: false,
          code: CommandErrorCode.FORMAT_INVALID,
          message: `Invalid params for ${definition.kind}: ${detail}`,
        };
      }

      const params = parsed.data;
      const { precondition } = definition;
      return {
        ok: true,
        prepared: {
          command,
          resultKind,
          referencedCells: definition.referencedCells(params),
          checkPrecondition: (actorCell, view) =>
            precondition ? precondition({ command, params, actorCell }, view) : null,
          apply: (actorCell, tx) => definition.apply({ command, params, actorCell }, tx),
        },
      };
    },
  };
}

export class CommandKindRegistry {
  private readonly handlers = new Map<string, CommandKindHandler>();

  register(handler: CommandKindHandler): this {
    if (this.handlers.has(handler.kind)) {
      throw new Error(`Command kind "${handler.kind}" is already registered`);
    }
    this.handlers.set(handler.kind, handler);
    return this;
  }

  has(kind: string): boolean {
    return this.handlers.has(kind);
  }

  get(kind: string): CommandKindHandler | undefined {
    return this.handlers.get(kind);
  }

  kinds(): string[] {
    return Array.from(this.handlers.keys());
  }

  prepare(command: CommandData): PrepareOutcome {
    const handler = this.handlers.get(command.kind);
    if (!handler) {
      return {
        ok: false,
        code: CommandErrorCode.UNKNOWN_KIND,
        message: `Unknown command kind: ${command.kind}`,
      };
    }
    return handler.prepare(command);
  }
}
