import { z } from 'zod';
import type { JsonValue } from '../types/command';

/**
 * Zod schemas for the snake_case wire form of commands, envelopes, execution
 * results and board snapshots.
 *
 * These describe structure only. Whether a `type` tag is a known command kind,
 * and what its params must look like, is decided by the CommandKindRegistry.
 */

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const CellSchema = z.tuple([z.number().int(), z.number().int()]);

export const MessageTypeSchema = z.enum(['command', 'response', 'broadcast']);

export const CommandDataWireSchema = z.object({
  timestamp: z.number().int().nonnegative().safe(),
  piece_id: z.string().min(1),
  type: z.string().min(1),
  params: z.array(JsonValueSchema),
});

export type CommandDataWire = z.infer<typeof CommandDataWireSchema>;

/**
 * Envelope with `message_type` left open so that an unknown type can be
 * reported as a protocol error rather than a format error.
 */
export const EnvelopeWireSchema = z.object({
  message_type: z.string().min(1),
  command_data: CommandDataWireSchema,
  client_id: z.string().default(''),
  session_id: z.string().default(''),
});

export type EnvelopeWire = z.infer<typeof EnvelopeWireSchema>;

export const SessionPhaseWireSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('active') }),
  z.object({ kind: z.literal('draw_offered'), offered_by: z.string().min(1) }),
  z.object({
    kind: z.literal('finished'),
    reason: z.enum(['resignation', 'draw_agreed']),
    piece_id: z.string().min(1),
  }),
]);

export type SessionPhaseWire = z.infer<typeof SessionPhaseWireSchema>;

export const PositionChangeWireSchema = z.object({
  piece_id: z.string().min(1),
  from: CellSchema.nullable(),
  to: CellSchema.nullable(),
});

export const ExecutionResultWireSchema = z.object({
  type: z.string().min(1),
  piece_id: z.string().min(1),
  from: CellSchema.optional(),
  to: CellSchema.optional(),
  changes: z.array(PositionChangeWireSchema),
  phase: SessionPhaseWireSchema.optional(),
  details: z.record(JsonValueSchema).default({}),
  version: z.number().int().positive(),
  timestamp: z.number().int().nonnegative(),
});

export type ExecutionResultWire = z.infer<typeof ExecutionResultWireSchema>;

export const ResponsePayloadWireSchema = z.object({
  success: z.boolean(),
  execution_result: ExecutionResultWireSchema.nullable(),
  error_message: z.string().nullable(),
  error_code: z.string().nullable().default(null),
});

export type ResponsePayloadWire = z.infer<typeof ResponsePayloadWireSchema>;

export const BoardSnapshotWireSchema = z.object({
  positions: z.record(CellSchema),
  bounds: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  }),
  phase: SessionPhaseWireSchema,
  version: z.number().int().nonnegative(),
});

export type BoardSnapshotWire = z.infer<typeof BoardSnapshotWireSchema>;

// --- Socket.IO control payloads ---

export const SessionRefPayloadSchema = z.object({
  sessionId: z.string().min(1),
});

export type SessionRefPayload = z.infer<typeof SessionRefPayloadSchema>;

export const EnvelopeTextSchema = z.string().min(2).max(64 * 1024);

export const SocketPayloadSchemas = {
  join_session: SessionRefPayloadSchema,
  leave_session: SessionRefPayloadSchema,
  request_snapshot: SessionRefPayloadSchema,
  message: EnvelopeTextSchema,
} as const;
