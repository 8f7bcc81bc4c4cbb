import { TaskConflictError } from '../../errors.js';
import { InsertResult, TaskStore } from '../interfaces/TaskStore.js';
import { isTerminal, NewVideoTask, TaskPatch, TaskStatus, VideoTask } from '../types/task.js';

/**
 * Process-local TaskStore. Check-and-insert runs without awaiting, so two
 * submissions can never both create a row for the same in-flight pair.
 */
export class InMemoryTaskStore implements TaskStore {
  private tasks = new Map<string, VideoTask>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insert(newTask: NewVideoTask): Promise<InsertResult> {
    if (newTask.taskType === 'process') {
      const existing = this.inFlight(newTask.owner, newTask.sourceUrl);
      if (existing) {
        return { task: structuredClone(existing), created: false };
      }
    }

    const timestamp = this.now().toISOString();
    const task: VideoTask = {
      ...newTask,
      status: 'pending',
      mediaType: null,
      metadata: null,
      mediaPaths: null,
      videoPath: null,
      audioPath: null,
      transcript: null,
      summary: null,
      error: null,
      createdAt: timestamp,
      updatedAt: timestamp
    };
    this.tasks.set(task.id, task);

    return { task: structuredClone(task), created: true };
  }

  async findById(id: string): Promise<VideoTask | null> {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : null;
  }

  async findInFlight(owner: string, sourceUrl: string): Promise<VideoTask | null> {
    const task = this.inFlight(owner, sourceUrl);
    return task ? structuredClone(task) : null;
  }

  async listInFlight(): Promise<VideoTask[]> {
    return [...this.tasks.values()]
      .filter(task => !isTerminal(task.status))
      .map(task => structuredClone(task));
  }

  async transition(id: string, expected: TaskStatus, patch: TaskPatch): Promise<VideoTask> {
    const current = this.tasks.get(id);
    if (!current || current.status !== expected) {
      throw new TaskConflictError(
        `Task ${id} is not in status ${expected} (found ${current?.status ?? 'nothing'})`
      );
    }

    const updated: VideoTask = {
      ...current,
      ...patch,
      updatedAt: this.now().toISOString()
    };
    this.tasks.set(id, updated);
    return structuredClone(updated);
  }

  private inFlight(owner: string, sourceUrl: string): VideoTask | undefined {
    for (const task of this.tasks.values()) {
      if (
        task.taskType === 'process' &&
        task.owner === owner &&
        task.sourceUrl === sourceUrl &&
        !isTerminal(task.status)
      ) {
        return task;
      }
    }
    return undefined;
  }
}
