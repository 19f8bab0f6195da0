import express from 'express';
import cors from 'cors';
import { createRoutes } from './routes/index.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { LearningOrchestrator } from './agents/index.js';

export interface AppOptions {
  orchestrator: LearningOrchestrator;
  frontendUrl?: string;
  requestLogging?: boolean;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: options.frontendUrl || 'http://localhost:5173',
    credentials: true
  }));
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  if (options.requestLogging !== false) {
    app.use((req, _res, next) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
      next();
    });
  }

  // API Routes
  app.use('/api', createRoutes(options.orchestrator));

  // 404 handler
  app.use(notFoundHandler);

  // Error handling
  app.use(errorHandler);

  return app;
}
