import type {
  CastleSide,
  Cell,
  CommandData,
  CommandKind,
  CommandStatus,
  ExecutionResult,
  JsonObject,
  JsonValue,
  ResponsePayload,
  WebSocketMessage,
} from '../../shared/types/command';
import {
  buildCommandMessage,
  encodeCommandData,
  encodeResponsePayload,
} from '../../shared/codec/envelopeCodec';

export interface ClientCommandJSON {
  timestamp: number;
  piece_id: string;
  type: string;
  params: JsonValue[];
  status: CommandStatus;
  sent_at: number | null;
  server_response: JsonObject | null;
}

const now = (): number => Date.now();

function copyParams(params: readonly JsonValue[]): JsonValue[] {
  return params.map((param) => structuredClone(param));
}

/**
 * A command as the client sees it: the immutable CommandData plus its
 * lifecycle status.
 *
 *   created --markSent--> sent --applyResponse--> confirmed | rejected
 *
 * Transitions out of order are refused (the method returns false); terminal
 * states never change.
 */
export class ClientCommand {
  private readonly data: CommandData;
  private currentStatus: CommandStatus;
  private response: ResponsePayload | null;
  private sentAtMs: number | null;

  constructor(data: CommandData) {
    this.data = {
      timestamp: data.timestamp,
      pieceId: data.pieceId,
      kind: data.kind,
      params: copyParams(data.params),
    };
    this.currentStatus = 'created';
    this.response = null;
    this.sentAtMs = null;
  }

  get timestamp(): number {
    return this.data.timestamp;
  }

  get pieceId(): string {
    return this.data.pieceId;
  }

  get kind(): CommandKind {
    return this.data.kind;
  }

  get params(): JsonValue[] {
    return copyParams(this.data.params);
  }

  get status(): CommandStatus {
    return this.currentStatus;
  }

  get sentAt(): number | null {
    return this.sentAtMs;
  }

  getCommandData(): CommandData {
    return { ...this.data, params: copyParams(this.data.params) };
  }

  toMessage(clientId: string, sessionId: string): WebSocketMessage {
    return buildCommandMessage(this.getCommandData(), clientId, sessionId);
  }

  markSent(at: number = now()): boolean {
    if (this.currentStatus !== 'created') {
      return false;
    }
    this.currentStatus = 'sent';
    this.sentAtMs = at;
    return true;
  }

  /**
   * Settle a sent command from its RESPONSE. Returns false, and changes
   * nothing, unless the command is currently `sent`.
   */
  applyResponse(payload: ResponsePayload): boolean {
    if (this.currentStatus !== 'sent') {
      return false;
    }
    this.response = payload;
    this.currentStatus = payload.success ? 'confirmed' : 'rejected';
    return true;
  }

  isConfirmed(): boolean {
    return this.currentStatus === 'confirmed';
  }

  isRejected(): boolean {
    return this.currentStatus === 'rejected';
  }

  /** Sent and awaiting its RESPONSE. */
  isPending(): boolean {
    return this.currentStatus === 'sent';
  }

  isTerminal(): boolean {
    return this.currentStatus === 'confirmed' || this.currentStatus === 'rejected';
  }

  getExecutionResult(): ExecutionResult | null {
    return this.response?.executionResult ?? null;
  }

  getErrorMessage(): string | null {
    return this.response?.errorMessage ?? null;
  }

  getErrorCode(): string | null {
    return this.response?.errorCode ?? null;
  }

  clone(): ClientCommand {
    const copy = new ClientCommand(this.data);
    copy.currentStatus = this.currentStatus;
    copy.sentAtMs = this.sentAtMs;
    copy.response = this.response ? structuredClone(this.response) : null;
    return copy;
  }

  toJSON(): ClientCommandJSON {
    const wire = encodeCommandData(this.data);
    return {
      timestamp: wire.timestamp,
      piece_id: wire.piece_id,
      type: wire.type,
      params: wire.params,
      status: this.currentStatus,
      sent_at: this.sentAtMs,
      server_response: this.response ? encodeResponsePayload(this.response) : null,
    };
  }

  // ──────────────────────────────────────────────────────────────
  // Factories for the built-in kinds
  // ──────────────────────────────────────────────────────────────

  static create(kind: CommandKind, pieceId: string, params: JsonValue[] = [], timestamp: number = now()): ClientCommand {
    return new ClientCommand({ timestamp, pieceId, kind, params });
  }

  static createMoveCommand(pieceId: string, from: Cell, to: Cell, timestamp?: number): ClientCommand {
    return ClientCommand.create('move', pieceId, [from, to], timestamp);
  }

  static createJumpCommand(pieceId: string, from: Cell, to: Cell, timestamp?: number): ClientCommand {
    return ClientCommand.create('jump', pieceId, [from, to], timestamp);
  }

  static createAttackCommand(pieceId: string, target: Cell, timestamp?: number): ClientCommand {
    return ClientCommand.create('attack', pieceId, [target], timestamp);
  }

  static createCaptureCommand(pieceId: string, from: Cell, to: Cell, timestamp?: number): ClientCommand {
    return ClientCommand.create('capture', pieceId, [from, to], timestamp);
  }

  static createCastleCommand(
    kingId: string,
    side: CastleSide,
    rookId: string,
    kingTo: Cell,
    rookTo: Cell,
    timestamp?: number
  ): ClientCommand {
    return ClientCommand.create('castle', kingId, [side, rookId, kingTo, rookTo], timestamp);
  }

  static createPromoteCommand(pieceId: string, promotedId: string, timestamp?: number): ClientCommand {
    return ClientCommand.create('promote', pieceId, [promotedId], timestamp);
  }

  static createResignCommand(pieceId: string, timestamp?: number): ClientCommand {
    return ClientCommand.create('resign', pieceId, [], timestamp);
  }

  static createDrawOfferCommand(pieceId: string, timestamp?: number): ClientCommand {
    return ClientCommand.create('draw_offer', pieceId, [], timestamp);
  }

  static createDrawAcceptCommand(pieceId: string, timestamp?: number): ClientCommand {
    return ClientCommand.create('draw_accept', pieceId, [], timestamp);
  }

  static createDrawDeclineCommand(pieceId: string, timestamp?: number): ClientCommand {
    return ClientCommand.create('draw_decline', pieceId, [], timestamp);
  }
}
