import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { VideoPipelineService } from '../../worker/services/VideoPipelineService.js';
import { VideoTask } from '../../worker/services/types/task.js';
import '../types.js';

export const submitTaskSchema = z.object({
  source_url: z.string({ required_error: 'source_url is required' }).min(1, 'source_url is required'),
  task_type: z.enum(['process', 'parse']).default('process')
});

/**
 * Wire shape of a task. Paths and outputs stay null until their stage ran.
 */
export function serializeTask(task: VideoTask) {
  return {
    task_id: task.id,
    task_type: task.taskType,
    source_url: task.sourceUrl,
    status: task.status,
    media_type: task.mediaType,
    metadata: task.metadata && {
      content_id: task.metadata.contentId,
      description: task.metadata.description,
      author: task.metadata.author
    },
    download_urls: task.metadata?.downloadUrls ?? null,
    media_paths: task.mediaPaths,
    video_path: task.videoPath,
    audio_path: task.audioPath,
    transcript: task.transcript,
    summary: task.summary,
    error: task.error,
    created_at: task.createdAt,
    updated_at: task.updatedAt
  };
}

export function createVideoTaskRoutes(pipeline: VideoPipelineService, authenticateUser: RequestHandler): Router {
  const router = Router();

  router.use(authenticateUser);

  /**
   * Submit a share link for processing
   * POST /api/video-tasks
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const owner = req.user?.id;
    if (!owner) {
      res.status(401).json({ message: 'User not authenticated' });
      return;
    }

    const parsed = submitTaskSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      res.status(400).json({ message: issue ? issue.message : 'Invalid request body' });
      return;
    }

    try {
      const { task, deduplicated } = await pipeline.submit(owner, parsed.data.source_url, parsed.data.task_type);
      res.status(202).json({ task_id: task.id, status: task.status, deduplicated });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Current state of one of the caller's tasks
   * GET /api/video-tasks/:taskId
   */
  router.get('/:taskId', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const owner = req.user?.id;
    if (!owner) {
      res.status(401).json({ message: 'User not authenticated' });
      return;
    }

    try {
      const task = await pipeline.get(req.params.taskId, owner);
      res.json(serializeTask(task));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
