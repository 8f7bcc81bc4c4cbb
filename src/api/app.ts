import express, { Express, RequestHandler } from 'express';
import cors from 'cors';
import { errorHandler } from './middleware/errorHandler.js';
import { createVideoTaskRoutes } from './routes/videoTasks.js';
import { VideoPipelineService } from '../worker/services/VideoPipelineService.js';

export interface AppDependencies {
  pipeline: VideoPipelineService;
  authenticateUser: RequestHandler;
}

export function createApp({ pipeline, authenticateUser }: AppDependencies): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/video-tasks', createVideoTaskRoutes(pipeline, authenticateUser));

  // Error handling middleware
  app.use(errorHandler);

  return app;
}
