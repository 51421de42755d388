import type { BoardSnapshotWire, SessionRefPayload } from '../validation/commandSchemas';

/**
 * Error codes used in structured Socket.IO `error` payloads.
 *
 * These cover failures that cannot be answered with a RESPONSE envelope
 * (no correlation key could be recovered, or the event was not a command).
 */
export type WebSocketErrorCode =
  | 'INVALID_PAYLOAD'
  | 'FORMAT_INVALID'
  | 'SESSION_NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface WebSocketErrorPayload {
  type: 'error';
  code: WebSocketErrorCode;
  /**
   * Name of the event that triggered this error, when known
   * (e.g. 'join_session', 'message').
   */
  event?: string;
  message: string;
}

export interface SessionSnapshotPayload {
  session_id: string;
  state: BoardSnapshotWire;
}

export interface SessionResetPayload {
  session_id: string;
  code: string;
  reason: string;
}

export interface SessionJoinedPayload {
  session_id: string;
  connection_id: string;
  version: number;
}

export interface ServerToClientEvents {
  /** RESPONSE and BROADCAST envelopes, as JSON text. */
  message: (envelope: string) => void;
  session_joined: (payload: SessionJoinedPayload) => void;
  session_snapshot: (payload: SessionSnapshotPayload) => void;
  session_reset: (payload: SessionResetPayload) => void;
  error: (payload: WebSocketErrorPayload) => void;
}

export interface ClientToServerEvents {
  join_session: (payload: SessionRefPayload) => void;
  leave_session: (payload: SessionRefPayload) => void;
  request_snapshot: (payload: SessionRefPayload) => void;
  /** COMMAND envelope, as JSON text. */
  message: (envelope: string) => void;
}

export type ServerToClientEventName = keyof ServerToClientEvents;
export type ClientToServerEventName = keyof ClientToServerEvents;

/**
 * One server → client emission, as handed to a Transport.
 */
export type ServerDelivery =
  | { event: 'message'; payload: string }
  | { event: 'session_joined'; payload: SessionJoinedPayload }
  | { event: 'session_snapshot'; payload: SessionSnapshotPayload }
  | { event: 'session_reset'; payload: SessionResetPayload }
  | { event: 'error'; payload: WebSocketErrorPayload };

export type { SessionRefPayload } from '../validation/commandSchemas';
