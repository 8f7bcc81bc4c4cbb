import { NewVideoTask, TaskPatch, TaskStatus, VideoTask } from '../types/task.js';

export interface InsertResult {
  task: VideoTask;
  /** false when an in-flight process task for the same owner and URL already existed */
  created: boolean;
}

export interface TaskStore {
  /**
   * Inserts a pending task. Process tasks are deduplicated against any
   * non-terminal process task for the same (owner, sourceUrl); the existing
   * row is returned instead.
   */
  insert(task: NewVideoTask): Promise<InsertResult>;

  findById(id: string): Promise<VideoTask | null>;

  findInFlight(owner: string, sourceUrl: string): Promise<VideoTask | null>;

  listInFlight(): Promise<VideoTask[]>;

  /**
   * Applies a status change and its outputs as one write, only if the task is
   * still in `expected`. Rejects with TaskConflictError otherwise.
   */
  transition(id: string, expected: TaskStatus, patch: TaskPatch): Promise<VideoTask>;
}
