import { errorMessage } from './errors.js';
import { TaskDispatcher } from './services/interfaces/PipelineServices.js';

interface QueuedJob {
  taskId: string;
  job: () => Promise<void>;
}

/**
 * Worker - runs dispatched task jobs in the background with a fixed
 * concurrency. Jobs dispatched before `start` (or after `stop`) wait in the
 * queue; `drain` resolves once every running job settled.
 */
export class TaskWorker implements TaskDispatcher {
  private queue: QueuedJob[] = [];
  private running = new Map<string, Promise<void>>();
  private isRunning = false;

  constructor(private readonly concurrency: number) {}

  get activeCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  start(): void {
    if (this.isRunning) {
      console.log('Worker is already running');
      return;
    }

    this.isRunning = true;
    console.log(`Worker started (concurrency ${this.concurrency})`);
    this.pump();
  }

  dispatch(taskId: string, job: () => Promise<void>): void {
    if (this.running.has(taskId) || this.queue.some(queued => queued.taskId === taskId)) {
      console.warn(`Task ${taskId} is already scheduled`);
      return;
    }

    this.queue.push({ taskId, job });
    this.pump();
  }

  /**
   * Stops picking up queued jobs. Running jobs are left to finish; await
   * `drain` to wait for them.
   */
  stop(): void {
    console.log('Stopping worker...');
    this.isRunning = false;
  }

  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running.values()]);
    }
  }

  private pump(): void {
    while (this.isRunning && this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (!next) return;

      const execution = this.execute(next).finally(() => {
        this.running.delete(next.taskId);
        this.pump();
      });
      this.running.set(next.taskId, execution);
    }
  }

  private async execute({ taskId, job }: QueuedJob): Promise<void> {
    try {
      await job();
    } catch (error) {
      console.error(`Job for task ${taskId} failed:`, errorMessage(error));
    }
  }
}
