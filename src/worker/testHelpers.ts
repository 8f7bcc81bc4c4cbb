import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { InMemoryTaskStore } from './services/implementations/InMemoryTaskStore.js';
import { TaskDispatcher } from './services/interfaces/PipelineServices.js';
import { TaskPatch, TaskStatus, VideoTask } from './services/types/task.js';

export interface StubReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>;

/**
 * Axios instance whose adapter answers in process. Status validation follows
 * the request's `validateStatus`, like the http adapter does.
 */
export function createHttpStub(handler: StubHandler): { http: AxiosInstance; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];

  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push(config);
      const reply = await handler(config);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config
      };

      const validate = config.validateStatus;
      if (!validate || validate(reply.status)) {
        return response;
      }
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    }
  });

  return { http, requests };
}

export function networkError(code: string, message = `connect ${code}`): AxiosError {
  return new AxiosError(message, code);
}

/**
 * Collects dispatched jobs so tests decide when background work runs.
 */
export class ManualDispatcher implements TaskDispatcher {
  jobs: Array<{ taskId: string; job: () => Promise<void> }> = [];

  dispatch(taskId: string, job: () => Promise<void>): void {
    this.jobs.push({ taskId, job });
  }

  async runAll(): Promise<void> {
    let next = this.jobs.shift();
    while (next) {
      await next.job();
      next = this.jobs.shift();
    }
  }
}

export interface RecordedTransition {
  id: string;
  from: TaskStatus;
  to: TaskStatus;
}

export class RecordingTaskStore extends InMemoryTaskStore {
  transitions: RecordedTransition[] = [];

  async transition(id: string, expected: TaskStatus, patch: TaskPatch): Promise<VideoTask> {
    const updated = await super.transition(id, expected, patch);
    this.transitions.push({ id, from: expected, to: patch.status });
    return updated;
  }

  statusesOf(id: string): TaskStatus[] {
    return this.transitions.filter(transition => transition.id === id).map(transition => transition.to);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function flushPromises(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
