import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { COMMAND_NAMES, type CommandOutcome, type CommandService } from '../services/CommandService.js';

/**
 * InvalidInput is the only rejected outcome; NotFound and LogEmpty travel as
 * normal responses whose `success` flag the caller checks.
 */
export function statusForOutcome(outcome: CommandOutcome): number {
  if (outcome.success) return 200;
  return outcome.error.kind === 'InvalidInput' ? 400 : 200;
}

/**
 * Command route handler
 * Delegates every named command to the CommandService
 */
export function createCommandRouter(commandService: CommandService): Router {
  const router = Router();

  /**
   * GET /api/commands - List supported command names
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ commands: COMMAND_NAMES });
  });

  /**
   * POST /api/commands/:command - Run a command; the JSON body is its parameter bundle
   */
  router.post('/:command', (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = commandService.execute(req.params.command, req.body ?? {});
      res.status(statusForOutcome(outcome)).json(outcome);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
