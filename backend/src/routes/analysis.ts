import { Router, Request, Response, NextFunction } from 'express';
import { LearningOrchestrator } from '../agents/index.js';
import { readRequiredString, readSessionId } from '../middleware/params.js';
import { FindResourcesResponse } from '../types/index.js';

export function createAnalysisRoutes(orchestrator: LearningOrchestrator): Router {
  const router = Router();

  /**
   * POST /api/analyze-task
   * Breaks a task description into prerequisites
   */
  router.post('/analyze-task', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const taskDescription = readRequiredString(req.body?.task_description, 'task_description');
      const sessionId = readSessionId(req.body?.session_id);

      const breakdown = await orchestrator.analyzeTask(sessionId, taskDescription);
      res.json(breakdown);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/find-resources
   * Learning resources for every prerequisite not marked as known
   */
  router.post('/find-resources', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = readSessionId(req.body?.session_id);
      const resources = await orchestrator.findResources(
        sessionId,
        req.body?.known_prerequisite_indices ?? []
      );

      const body: FindResourcesResponse = { resources };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/export-markdown
   * Current analysis and resources as a markdown document
   */
  router.post('/export-markdown', (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = readSessionId(req.body?.session_id);
      res.json(orchestrator.exportMarkdown(sessionId));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
