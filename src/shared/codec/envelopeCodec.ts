import type { ZodError } from 'zod';
import type {
  BoardSnapshot,
  Cell,
  CommandData,
  ExecutionResult,
  JsonObject,
  JsonValue,
  MessageType,
  PositionChange,
  ResponsePayload,
  SessionPhase,
  WebSocketMessage,
} from '../types/command';
import { CommandErrorCode, FormatError, ProtocolError } from '../errors';
import {
  BoardSnapshotWireSchema,
  CommandDataWireSchema,
  EnvelopeWireSchema,
  ExecutionResultWireSchema,
  MessageTypeSchema,
  ResponsePayloadWireSchema,
  type BoardSnapshotWire,
  type CommandDataWire,
  type ExecutionResultWire,
  type SessionPhaseWire,
} from '../validation/commandSchemas';

/**
 * Transport-agnostic codec for the command envelope.
 *
 * Wire form (JSON text):
 *
 * ```json
 * {
 *   "message_type": "command",
 *   "command_data": { "timestamp": 1700000000000, "piece_id": "pawn_e2", "type": "move", "params": [[1, 4], [3, 4]] },
 *   "client_id": "client-a",
 *   "session_id": "room-1",
 *   "timestamp": 1700000000000
 * }
 * ```
 *
 * The top-level `timestamp` mirrors `command_data.timestamp` and is ignored on
 * decode. Decoders throw FormatError on malformed input and ProtocolError on an
 * unknown `message_type`.
 */

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`)
    .join('; ');
}

function parseJsonText(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new FormatError(`${what} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

// ---------------------------------------------------------------------------
// Command data
// ---------------------------------------------------------------------------

export function encodeCommandData(data: CommandData): CommandDataWire {
  return {
    timestamp: data.timestamp,
    piece_id: data.pieceId,
    type: data.kind,
    params: [...data.params],
  };
}

export function decodeCommandData(raw: unknown): CommandData {
  const parsed = CommandDataWireSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatError(`Invalid command data: ${describeIssues(parsed.error)}`);
  }
  return {
    timestamp: parsed.data.timestamp,
    pieceId: parsed.data.piece_id,
    kind: parsed.data.type,
    params: parsed.data.params,
  };
}

// ---------------------------------------------------------------------------
// Session phase / execution result / snapshot
// ---------------------------------------------------------------------------

export function encodeSessionPhase(phase: SessionPhase): SessionPhaseWire {
  switch (phase.kind) {
    case 'active':
      return { kind: 'active' };
    case 'draw_offered':
      return { kind: 'draw_offered', offered_by: phase.offeredBy };
    case 'finished':
      return { kind: 'finished', reason: phase.reason, piece_id: phase.pieceId };
  }
}

export function decodeSessionPhase(wire: SessionPhaseWire): SessionPhase {
  switch (wire.kind) {
    case 'active':
      return { kind: 'active' };
    case 'draw_offered':
      return { kind: 'draw_offered', offeredBy: wire.offered_by };
    case 'finished':
      return { kind: 'finished', reason: wire.reason, pieceId: wire.piece_id };
  }
}

function encodeChange(change: PositionChange): JsonObject {
  return { piece_id: change.pieceId, from: change.from, to: change.to };
}

export function encodeExecutionResult(result: ExecutionResult): JsonObject {
  const wire: JsonObject = {
    type: result.kind,
    piece_id: result.pieceId,
    changes: result.changes.map(encodeChange),
    details: result.details,
    version: result.version,
    timestamp: result.committedAt,
  };
  if (result.from) {
    wire.from = result.from;
  }
  if (result.to) {
    wire.to = result.to;
  }
  if (result.phase) {
    wire.phase = encodeSessionPhase(result.phase);
  }
  return wire;
}

function fromExecutionResultWire(wire: ExecutionResultWire): ExecutionResult {
  const result: ExecutionResult = {
    kind: wire.type,
    pieceId: wire.piece_id,
    changes: wire.changes.map((c) => ({ pieceId: c.piece_id, from: c.from, to: c.to })),
    details: wire.details,
    version: wire.version,
    committedAt: wire.timestamp,
  };
  if (wire.from) {
    result.from = wire.from;
  }
  if (wire.to) {
    result.to = wire.to;
  }
  if (wire.phase) {
    result.phase = decodeSessionPhase(wire.phase);
  }
  return result;
}

export function decodeExecutionResult(raw: unknown): ExecutionResult {
  const parsed = ExecutionResultWireSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatError(`Invalid execution result: ${describeIssues(parsed.error)}`);
  }
  return fromExecutionResultWire(parsed.data);
}

export function encodeSnapshot(snapshot: BoardSnapshot): BoardSnapshotWire {
  const positions: Record<string, Cell> = {};
  for (const [pieceId, cell] of Object.entries(snapshot.positions)) {
    positions[pieceId] = [cell[0], cell[1]];
  }
  return {
    positions,
    bounds: { width: snapshot.bounds.width, height: snapshot.bounds.height },
    phase: encodeSessionPhase(snapshot.phase),
    version: snapshot.version,
  };
}

export function decodeSnapshot(raw: unknown): BoardSnapshot {
  const parsed = BoardSnapshotWireSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatError(`Invalid board snapshot: ${describeIssues(parsed.error)}`);
  }
  return {
    positions: parsed.data.positions,
    bounds: parsed.data.bounds,
    phase: decodeSessionPhase(parsed.data.phase),
    version: parsed.data.version,
  };
}

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

export function envelopeToWire(message: WebSocketMessage): JsonObject {
  const commandData = encodeCommandData(message.commandData);
  return {
    message_type: message.messageType,
    command_data: {
      timestamp: commandData.timestamp,
      piece_id: commandData.piece_id,
      type: commandData.type,
      params: commandData.params,
    },
    client_id: message.clientId,
    session_id: message.sessionId,
    timestamp: commandData.timestamp,
  };
}

export function encodeEnvelope(message: WebSocketMessage): string {
  return JSON.stringify(envelopeToWire(message));
}

/**
 * Decode an envelope from JSON text or from an already-parsed object.
 */
export function decodeEnvelope(input: unknown): WebSocketMessage {
  const raw = typeof input === 'string' ? parseJsonText(input, 'Envelope') : input;

  const parsed = EnvelopeWireSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatError(`Invalid envelope: ${describeIssues(parsed.error)}`);
  }

  const messageType = MessageTypeSchema.safeParse(parsed.data.message_type);
  if (!messageType.success) {
    throw new ProtocolError(
      CommandErrorCode.UNKNOWN_MESSAGE_TYPE,
      `Unknown message_type: ${parsed.data.message_type}`,
      { messageType: parsed.data.message_type }
    );
  }

  return {
    messageType: messageType.data,
    commandData: {
      timestamp: parsed.data.command_data.timestamp,
      pieceId: parsed.data.command_data.piece_id,
      kind: parsed.data.command_data.type,
      params: parsed.data.command_data.params,
    },
    clientId: parsed.data.client_id,
    sessionId: parsed.data.session_id,
  };
}

/**
 * Best-effort recovery of the correlation key from a payload that failed
 * decoding, so the server can still answer with a RESPONSE.
 */
export interface SalvagedCorrelation {
  timestamp: number;
  pieceId: string;
  kind: string;
  clientId: string;
  sessionId: string;
}

function readField(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null || Array.isArray(source)) {
    return undefined;
  }
  const entry = Object.entries(source).find(([name]) => name === key);
  return entry ? entry[1] : undefined;
}

export function salvageCorrelation(input: unknown): SalvagedCorrelation | null {
  let raw: unknown = input;
  if (typeof input === 'string') {
    try {
      raw = JSON.parse(input);
    } catch {
      return null;
    }
  }

  const commandData = readField(raw, 'command_data');
  const timestamp = readField(commandData, 'timestamp');
  const pieceId = readField(commandData, 'piece_id');
  if (typeof timestamp !== 'number' || !Number.isInteger(timestamp) || typeof pieceId !== 'string') {
    return null;
  }

  const kind = readField(commandData, 'type');
  const clientId = readField(raw, 'client_id');
  const sessionId = readField(raw, 'session_id');

  return {
    timestamp,
    pieceId,
    kind: typeof kind === 'string' && kind.length > 0 ? kind : 'unknown',
    clientId: typeof clientId === 'string' ? clientId : '',
    sessionId: typeof sessionId === 'string' ? sessionId : '',
  };
}

// ---------------------------------------------------------------------------
// Message builders
// ---------------------------------------------------------------------------

function createMessage(
  messageType: MessageType,
  commandData: CommandData,
  clientId: string,
  sessionId: string
): WebSocketMessage {
  return { messageType, commandData, clientId, sessionId };
}

export function buildCommandMessage(
  command: CommandData,
  clientId: string,
  sessionId: string
): WebSocketMessage {
  return createMessage('command', command, clientId, sessionId);
}

export function encodeResponsePayload(payload: ResponsePayload): JsonObject {
  return {
    success: payload.success,
    execution_result: payload.executionResult ? encodeExecutionResult(payload.executionResult) : null,
    error_message: payload.errorMessage,
    error_code: payload.errorCode,
  };
}

/**
 * RESPONSE echoes the original timestamp, piece id and kind so the client can
 * correlate it; the outcome travels in the single params slot.
 */
export function buildResponseMessage(
  command: Pick<CommandData, 'timestamp' | 'pieceId' | 'kind'>,
  payload: ResponsePayload,
  clientId: string,
  sessionId: string
): WebSocketMessage {
  return createMessage(
    'response',
    {
      timestamp: command.timestamp,
      pieceId: command.pieceId,
      kind: command.kind,
      params: [encodeResponsePayload(payload)],
    },
    clientId,
    sessionId
  );
}

export function buildBroadcastMessage(
  command: Pick<CommandData, 'timestamp' | 'pieceId' | 'kind'>,
  result: ExecutionResult,
  sessionId: string
): WebSocketMessage {
  return createMessage(
    'broadcast',
    {
      timestamp: command.timestamp,
      pieceId: command.pieceId,
      kind: command.kind,
      params: [encodeExecutionResult(result)],
    },
    '',
    sessionId
  );
}

function singleParam(message: WebSocketMessage, expected: MessageType): JsonValue {
  if (message.messageType !== expected) {
    throw new FormatError(`Expected a ${expected} message, got ${message.messageType}`);
  }
  const [first] = message.commandData.params;
  if (message.commandData.params.length !== 1 || first === undefined) {
    throw new FormatError(`A ${expected} message carries exactly one params entry`);
  }
  return first;
}

export function readResponsePayload(message: WebSocketMessage): ResponsePayload {
  const parsed = ResponsePayloadWireSchema.safeParse(singleParam(message, 'response'));
  if (!parsed.success) {
    throw new FormatError(`Invalid response payload: ${describeIssues(parsed.error)}`);
  }
  return {
    success: parsed.data.success,
    executionResult: parsed.data.execution_result
      ? fromExecutionResultWire(parsed.data.execution_result)
      : null,
    errorMessage: parsed.data.error_message,
    errorCode: parsed.data.error_code,
  };
}

export function readBroadcastResult(message: WebSocketMessage): ExecutionResult {
  return decodeExecutionResult(singleParam(message, 'broadcast'));
}
