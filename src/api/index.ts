import { Router } from 'express';
import { createCommandRouter } from './commandRoutes.js';
import type { CommandService } from '../services/CommandService.js';

/**
 * Main API router - composes all route handlers
 * Dependencies injected from server.ts
 */
export function createApiRouter(deps: { commandService: CommandService }): Router {
  const router = Router();

  router.use('/commands', createCommandRouter(deps.commandService));

  return router;
}
