import { Router, Request, Response, NextFunction } from 'express';
import { LearningOrchestrator } from '../agents/index.js';
import { readSessionId } from '../middleware/params.js';

export function createSessionRoutes(orchestrator: LearningOrchestrator): Router {
  const router = Router();

  /**
   * GET /api/session?session_id=...
   * Current phase and counts for a session
   */
  router.get('/session', (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = readSessionId(req.query.session_id);
      res.json(orchestrator.getSession(sessionId));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/reset-session?session_id=...
   * Discards all session data
   */
  router.delete('/reset-session', (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = readSessionId(req.query.session_id);
      orchestrator.resetSession(sessionId);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
