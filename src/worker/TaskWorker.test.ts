import { describe, test, expect, jest } from '@jest/globals';
import { deferred, flushPromises } from './testHelpers.js';
import { TaskWorker } from './TaskWorker.js';

describe('TaskWorker', () => {
  test('holds dispatched jobs until started', async () => {
    const worker = new TaskWorker(2);
    const job = jest.fn(async () => undefined);

    worker.dispatch('task-1', job);
    expect(worker.queuedCount).toBe(1);
    expect(job).not.toHaveBeenCalled();

    worker.start();
    await worker.drain();

    expect(job).toHaveBeenCalledTimes(1);
    expect(worker.queuedCount).toBe(0);
  });

  test('never runs more jobs than its concurrency', async () => {
    const worker = new TaskWorker(1);
    const first = deferred();
    const second = jest.fn(async () => undefined);
    worker.start();

    worker.dispatch('task-1', () => first.promise);
    worker.dispatch('task-2', second);

    expect(worker.activeCount).toBe(1);
    expect(worker.queuedCount).toBe(1);
    expect(second).not.toHaveBeenCalled();

    first.resolve();
    await flushPromises();

    expect(second).toHaveBeenCalledTimes(1);
    await worker.drain();
    expect(worker.activeCount).toBe(0);
  });

  test('ignores a task that is already scheduled', async () => {
    const worker = new TaskWorker(1);
    const job = jest.fn(async () => undefined);

    worker.dispatch('task-1', job);
    worker.dispatch('task-1', job);
    worker.start();
    await worker.drain();

    expect(job).toHaveBeenCalledTimes(1);
  });

  test('keeps going after a job rejects', async () => {
    const worker = new TaskWorker(1);
    const next = jest.fn(async () => undefined);
    worker.start();

    worker.dispatch('task-1', async () => {
      throw new Error('boom');
    });
    worker.dispatch('task-2', next);
    await flushPromises();
    await worker.drain();

    expect(next).toHaveBeenCalledTimes(1);
  });

  test('stop leaves queued jobs alone and drain waits for running ones', async () => {
    const worker = new TaskWorker(1);
    const running = deferred();
    const queued = jest.fn(async () => undefined);
    let finished = false;
    worker.start();

    worker.dispatch('task-1', async () => {
      await running.promise;
      finished = true;
    });
    worker.dispatch('task-2', queued);
    worker.stop();

    const drained = worker.drain();
    running.resolve();
    await drained;

    expect(finished).toBe(true);
    expect(queued).not.toHaveBeenCalled();
    expect(worker.queuedCount).toBe(1);
  });
});
