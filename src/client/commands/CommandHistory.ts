import type { CommandKind } from '../../shared/types/command';
import type { ClientCommand, ClientCommandJSON } from './ClientCommand';

export interface CommandHistorySnapshot {
  size: number;
  commands: ClientCommandJSON[];
}

/**
 * Append-only record of every command this client created, in creation order.
 * Commands are stored by reference so their status stays current.
 */
export class CommandHistory {
  private readonly commands: ClientCommand[] = [];

  add(command: ClientCommand): void {
    this.commands.push(command);
  }

  get size(): number {
    return this.commands.length;
  }

  getAll(): ClientCommand[] {
    return [...this.commands];
  }

  /** The last `count` commands, oldest first. */
  getRecent(count = 10): ClientCommand[] {
    if (count <= 0) {
      return [];
    }
    return this.commands.slice(-count);
  }

  getByPiece(pieceId: string): ClientCommand[] {
    return this.commands.filter((command) => command.pieceId === pieceId);
  }

  getByKind(kind: CommandKind): ClientCommand[] {
    return this.commands.filter((command) => command.kind === kind);
  }

  find(timestamp: number, pieceId?: string): ClientCommand | undefined {
    return this.commands.find(
      (command) => command.timestamp === timestamp && (pieceId === undefined || command.pieceId === pieceId)
    );
  }

  clear(): void {
    this.commands.length = 0;
  }

  /**
   * Read-only copy for persistence or logging.
   */
  snapshot(): Readonly<CommandHistorySnapshot> {
    return Object.freeze({
      size: this.commands.length,
      commands: this.commands.map((command) => command.toJSON()),
    });
  }
}
