import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler, createError } from '../middleware/errorHandler';
import {
  encodeCommandData,
  encodeExecutionResult,
  encodeSnapshot,
} from '../../shared/codec/envelopeCodec';
import type { CommandSessionManager } from '../game/CommandSessionManager';
import type { CommitRecord } from '../game/CommandSession';

const SessionIdParamSchema = z.object({
  sessionId: z.string().min(1).max(128),
});

const CommitLogQuerySchema = z.object({
  since: z.coerce.number().int().nonnegative().default(0),
});

function encodeCommitRecord(record: CommitRecord) {
  return {
    version: record.version,
    client_id: record.clientId,
    command: encodeCommandData(record.command),
    result: encodeExecutionResult(record.result),
  };
}

/**
 * Read-only HTTP view of live sessions, plus an operator endpoint to close one.
 */
export function createSessionRoutes(manager: CommandSessionManager): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ success: true, data: { sessions: manager.listSessions() } });
  });

  router.get('/:sessionId/state', (req, res) => {
    const { sessionId } = SessionIdParamSchema.parse(req.params);
    const snapshot = manager.getSnapshot(sessionId);
    if (!snapshot) {
      throw createError(`Session ${sessionId} not found`, 404, 'SESSION_NOT_FOUND');
    }
    res.json({ success: true, data: { session_id: sessionId, state: encodeSnapshot(snapshot) } });
  });

  router.get('/:sessionId/commits', (req, res) => {
    const { sessionId } = SessionIdParamSchema.parse(req.params);
    const { since } = CommitLogQuerySchema.parse(req.query);
    const commits = manager.getCommitLog(sessionId, since);
    if (!commits) {
      throw createError(`Session ${sessionId} not found`, 404, 'SESSION_NOT_FOUND');
    }
    res.json({
      success: true,
      data: { session_id: sessionId, since, commits: commits.map(encodeCommitRecord) },
    });
  });

  router.delete(
    '/:sessionId',
    asyncHandler(async (req, res) => {
      const { sessionId } = SessionIdParamSchema.parse(req.params);
      const ended = await manager.endSession(sessionId);
      if (!ended) {
        throw createError(`Session ${sessionId} not found`, 404, 'SESSION_NOT_FOUND');
      }
      res.status(204).end();
    })
  );

  return router;
}
