import type { Cell, CommandKind, JsonValue } from '../../shared/types/command';
import type { BoardView } from '../../shared/types/board';

/**
 * Game-specific legality hook consulted as the last validation step, after
 * structure, existence, bounds and state consistency have all passed.
 *
 * Resolvers run synchronously under the session lock: no I/O, no mutation.
 * The board they receive is a detached read-only view.
 */

export interface RuleRequest {
  kind: CommandKind;
  pieceId: string;
  params: readonly JsonValue[];
  timestamp: number;
  /** Current cell of the acting piece. */
  actorCell: Cell;
  board: BoardView;
}

export type RuleVerdict = { legal: true } | { legal: false; reason?: string };

export interface RuleResolver {
  isLegal(request: RuleRequest): RuleVerdict;
}

/**
 * Accepts everything. Used when no game rules are plugged in.
 */
export class PermissiveRuleResolver implements RuleResolver {
  isLegal(): RuleVerdict {
    return { legal: true };
  }
}

/**
 * Consults resolvers in order; the first rejection wins.
 */
export class CompositeRuleResolver implements RuleResolver {
  private readonly resolvers: RuleResolver[];

  constructor(resolvers: RuleResolver[] = []) {
    this.resolvers = [...resolvers];
  }

  add(resolver: RuleResolver): this {
    this.resolvers.push(resolver);
    return this;
  }

  isLegal(request: RuleRequest): RuleVerdict {
    for (const resolver of this.resolvers) {
      const verdict = resolver.isLegal(request);
      if (!verdict.legal) {
        return verdict;
      }
    }
    return { legal: true };
  }
}

/**
 * Adapts a plain predicate, e.g. `kindRule('castle', () => ({ legal: false, reason: 'Castling disabled' }))`.
 */
export function kindRule(
  kind: CommandKind,
  check: (request: RuleRequest) => RuleVerdict
): RuleResolver {
  return {
    isLegal(request) {
      return request.kind === kind ? check(request) : { legal: true };
    },
  };
}
