import { Router } from 'express';
import { LearningOrchestrator } from '../agents/index.js';
import { createAnalysisRoutes } from './analysis.js';
import { createAgentRoutes } from './agents.js';
import { createSessionRoutes } from './session.js';
import { createUploadRoutes } from './upload.js';
import { HealthResponse } from '../types/index.js';

export const SERVICE_NAME = 'LearnPath API';

export function createRoutes(orchestrator: LearningOrchestrator): Router {
  const router = Router();

  // Health check
  router.get('/health', (_req, res) => {
    const body: HealthResponse = { status: 'healthy', service: SERVICE_NAME };
    res.json(body);
  });

  // API Routes
  router.use(createAnalysisRoutes(orchestrator));
  router.use(createAgentRoutes(orchestrator));
  router.use(createSessionRoutes(orchestrator));
  router.use(createUploadRoutes());

  return router;
}
