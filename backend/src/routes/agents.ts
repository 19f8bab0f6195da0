import { Router, Request, Response, NextFunction } from 'express';
import { LearningOrchestrator } from '../agents/index.js';
import { readRequiredString, readSessionId } from '../middleware/params.js';

/**
 * Plan / code example / tutor helpers. The model output is returned as-is.
 */
export function createAgentRoutes(orchestrator: LearningOrchestrator): Router {
  const router = Router();

  router.post('/generate-plan', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = readSessionId(req.body?.session_id);
      const plan = await orchestrator.generatePlan(sessionId);
      res.json({ plan });
    } catch (error) {
      next(error);
    }
  });

  router.post('/get-code-example', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = readSessionId(req.body?.session_id);
      const concept = readRequiredString(req.body?.concept, 'concept');
      const code = await orchestrator.getCodeExample(sessionId, concept);
      res.json({ code });
    } catch (error) {
      next(error);
    }
  });

  router.post('/ask-tutor', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = readSessionId(req.body?.session_id);
      const query = readRequiredString(req.body?.query, 'query');
      const response = await orchestrator.askTutor(sessionId, query);
      res.json({ response });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
