/**
 * Core command and board types shared by the authoritative server and the
 * client-side tracker/reconciler.
 *
 * Field names here are camelCase; the snake_case wire form lives in
 * `../validation/commandSchemas` and is produced by the envelope codec.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/** A board cell as `[row, col]`. */
export type Cell = [row: number, col: number];

export interface BoardBounds {
  width: number;
  height: number;
}

export const BUILTIN_COMMAND_KINDS = [
  'move',
  'jump',
  'attack',
  'capture',
  'castle',
  'promote',
  'resign',
  'draw_offer',
  'draw_accept',
  'draw_decline',
] as const;

export type BuiltinCommandKind = (typeof BUILTIN_COMMAND_KINDS)[number];

/**
 * Open tagged union: the built-in tags plus any tag registered at runtime
 * through the CommandKindRegistry.
 */
export type CommandKind = BuiltinCommandKind | (string & {});

/** Client-side lifecycle status. Never persisted by the server. */
export type CommandStatus = 'created' | 'sent' | 'confirmed' | 'rejected';

export interface CommandData {
  /** Client-assigned ms timestamp; doubles as the command identity per client. */
  timestamp: number;
  pieceId: string;
  kind: CommandKind;
  params: JsonValue[];
}

export type CastleSide = 'kingside' | 'queenside';

export type SessionPhase =
  | { kind: 'active' }
  | { kind: 'draw_offered'; offeredBy: string }
  | { kind: 'finished'; reason: 'resignation' | 'draw_agreed'; pieceId: string };

/**
 * One position change inside a committed command. `from: null` means the
 * piece was added, `to: null` means it was removed.
 */
export interface PositionChange {
  pieceId: string;
  from: Cell | null;
  to: Cell | null;
}

export interface ExecutionResult {
  /** Result tag, e.g. `move_executed`. */
  kind: string;
  pieceId: string;
  from?: Cell;
  to?: Cell;
  changes: PositionChange[];
  /** Present when the command changed the session phase. */
  phase?: SessionPhase;
  details: Record<string, JsonValue>;
  /** Board version produced by this commit. */
  version: number;
  committedAt: number;
}

export interface BoardSnapshot {
  positions: Record<string, Cell>;
  bounds: BoardBounds;
  phase: SessionPhase;
  version: number;
}

export type MessageType = 'command' | 'response' | 'broadcast';

export interface WebSocketMessage {
  messageType: MessageType;
  commandData: CommandData;
  /** Originating client; empty for broadcasts. */
  clientId: string;
  sessionId: string;
}

/** Decoded content of a RESPONSE message's single params slot. */
export interface ResponsePayload {
  success: boolean;
  executionResult: ExecutionResult | null;
  errorMessage: string | null;
  errorCode: string | null;
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

export function cellKey(cell: Cell): string {
  return `${cell[0]},${cell[1]}`;
}

export function formatCell(cell: Cell): string {
  return `(${cell[0]},${cell[1]})`;
}
