import type { CommandKind, JsonValue } from '../../shared/types/command';
import { ClientCommand } from './ClientCommand';

/**
 * Fluent helper for assembling a command step by step, e.g. from UI input.
 */
export class CommandBuilder {
  private pieceId = '';
  private kind: CommandKind | null = null;
  private params: JsonValue[] = [];
  private timestamp: number | null = null;

  setPiece(pieceId: string): this {
    this.pieceId = pieceId;
    return this;
  }

  setKind(kind: CommandKind): this {
    this.kind = kind;
    return this;
  }

  addParam(param: JsonValue): this {
    this.params.push(param);
    return this;
  }

  setParams(params: readonly JsonValue[]): this {
    this.params = [...params];
    return this;
  }

  /** Optional; defaults to the current time at build. */
  setTimestamp(timestamp: number): this {
    this.timestamp = timestamp;
    return this;
  }

  /**
   * Returns null while the piece or the kind is missing.
   */
  build(): ClientCommand | null {
    if (!this.pieceId || !this.kind) {
      return null;
    }
    return ClientCommand.create(this.kind, this.pieceId, this.params, this.timestamp ?? Date.now());
  }

  reset(): this {
    this.pieceId = '';
    this.kind = null;
    this.params = [];
    this.timestamp = null;
    return this;
  }
}
