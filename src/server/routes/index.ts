import { Router } from 'express';
import type { CommandSessionManager } from '../game/CommandSessionManager';
import { createSessionRoutes } from './sessions';

export const setupRoutes = (manager: CommandSessionManager): Router => {
  const router = Router();

  router.use('/sessions', createSessionRoutes(manager));

  return router;
};
