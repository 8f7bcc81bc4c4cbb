import path from 'path';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { errorMessage, NotFoundError, TaskConflictError, TaskPersistenceError } from '../errors.js';
import { localToolRetryPolicy, networkRetryPolicy, RetryPolicy, Sleep, withRetry } from '../utils/retry.js';
import { normalizeShareUrl } from '../utils/shareUrl.js';
import {
  AudioExtractor,
  MediaAsset,
  MediaFetcher,
  MediaResolver,
  ParsedMedia,
  SummarizationClient,
  TaskDispatcher,
  TaskNotifier,
  TranscriptionClient
} from './interfaces/PipelineServices.js';
import { TaskStore } from './interfaces/TaskStore.js';
import { canTransition, MediaMetadata, TaskPatch, TaskStatus, TaskType, VideoTask } from './types/task.js';

export type PipelineStage = 'resolve' | 'download' | 'extract audio' | 'transcribe' | 'summarize';

export const INTERRUPTED_ERROR = 'interrupted: worker restarted before completion';

// Stage that is running while a task sits in a given status
const STAGE_BY_STATUS: Partial<Record<TaskStatus, PipelineStage>> = {
  pending: 'resolve',
  downloading: 'download',
  extracting_audio: 'extract audio',
  transcribing: 'transcribe',
  summarizing: 'summarize'
};

export interface PipelineDependencies {
  store: TaskStore;
  resolver: MediaResolver;
  fetcher: MediaFetcher;
  extractor: AudioExtractor;
  transcriber: TranscriptionClient;
  summarizer: SummarizationClient;
  notifier: TaskNotifier;
  dispatcher: TaskDispatcher;
}

export interface PipelineOptions {
  mediaRoot: string;
  allowedHosts: readonly string[];
  retryBaseDelayMs: number;
  sleep?: Sleep;
}

export interface SubmitResult {
  task: VideoTask;
  /** true when an in-flight task for the same owner and URL was returned */
  deduplicated: boolean;
}

/**
 * Picks the highest bit rate video variant; variants without a bit rate rank
 * last and ties keep upstream order.
 */
export function selectBestVideo(assets: readonly MediaAsset[]): MediaAsset | undefined {
  let best: MediaAsset | undefined;
  for (const asset of assets) {
    if (asset.kind !== 'video') continue;
    if (!best || (asset.bitRate ?? -1) > (best.bitRate ?? -1)) {
      best = asset;
    }
  }
  return best;
}

function toMetadata(media: ParsedMedia): MediaMetadata {
  return {
    contentId: media.contentId,
    description: media.description,
    author: media.author,
    downloadUrls: media.assets.map(asset => asset.url)
  };
}

// Content ids come from upstream, keep them to one safe path segment
function contentDirectoryName(contentId: string): string {
  return contentId.replace(/[^A-Za-z0-9_-]/g, '_') || 'unknown';
}

/**
 * Video Pipeline Service - owns the task lifecycle.
 *
 * `submit` persists a pending task and hands `run` to the dispatcher; `run`
 * walks the task through resolve, download, extract audio, transcribe and
 * summarize. Every stage output is written together with the next status
 * through a conditional transition, and every run ends in `completed` or
 * `failed` with a stage-tagged error.
 */
export class VideoPipelineService {
  private readonly networkPolicy: RetryPolicy;
  private readonly localToolPolicy: RetryPolicy;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {
    this.networkPolicy = networkRetryPolicy(options.retryBaseDelayMs);
    this.localToolPolicy = localToolRetryPolicy(options.retryBaseDelayMs);
  }

  async submit(owner: string, sourceUrl: string, taskType: TaskType): Promise<SubmitResult> {
    const normalizedUrl = normalizeShareUrl(sourceUrl, this.options.allowedHosts);

    const { task, created } = await this.deps.store.insert({
      id: uuidv4(),
      owner,
      taskType,
      sourceUrl: normalizedUrl
    });

    if (!created) {
      console.log(`Duplicate submission for ${normalizedUrl}, returning in-flight task ${task.id}`);
      return { task, deduplicated: true };
    }

    console.log(`Created ${taskType} task ${task.id} for ${normalizedUrl}`);
    this.deps.dispatcher.dispatch(task.id, () => this.run(task.id));
    return { task, deduplicated: false };
  }

  async get(taskId: string, owner: string): Promise<VideoTask> {
    if (!isUuid(taskId)) {
      throw new NotFoundError();
    }

    const task = await this.deps.store.findById(taskId);
    // A foreign task is reported exactly like a missing one
    if (!task || task.owner !== owner) {
      throw new NotFoundError();
    }
    return task;
  }

  /**
   * Background body of a task. Never rejects: stage failures end up in the
   * task row, anything else is logged.
   */
  async run(taskId: string): Promise<void> {
    const task = await this.loadRunnable(taskId);
    if (!task) return;

    console.log(`Processing ${task.taskType} task ${task.id} for ${task.sourceUrl}`);

    let finished: VideoTask;
    try {
      finished = task.taskType === 'parse' ? await this.runParse(task) : await this.runProcess(task);
    } catch (error) {
      const failed = await this.fail(task, error);
      if (failed) await this.notify(failed);
      return;
    }

    console.log(`Task ${finished.id} completed`);
    await this.notify(finished);
  }

  /**
   * Settles tasks left behind by a previous process. Pending tasks never
   * started a stage and are dispatched again; tasks caught mid-stage are
   * failed because their partial artifacts cannot be trusted.
   */
  async recoverInterruptedTasks(): Promise<{ redispatched: number; failed: number }> {
    const inFlight = await this.deps.store.listInFlight();
    let redispatched = 0;
    let failed = 0;

    for (const task of inFlight) {
      if (task.status === 'pending') {
        this.deps.dispatcher.dispatch(task.id, () => this.run(task.id));
        redispatched++;
        continue;
      }

      try {
        await this.deps.store.transition(task.id, task.status, { status: 'failed', error: INTERRUPTED_ERROR });
        failed++;
      } catch (error) {
        if (!(error instanceof TaskConflictError)) throw error;
        console.warn(`Task ${task.id} changed while recovering, leaving it as is`);
      }
    }

    if (inFlight.length > 0) {
      console.log(`Recovered ${inFlight.length} interrupted tasks (${redispatched} re-queued, ${failed} failed)`);
    }
    return { redispatched, failed };
  }

  private async loadRunnable(taskId: string): Promise<VideoTask | null> {
    let task: VideoTask | null;
    try {
      task = await this.deps.store.findById(taskId);
    } catch (error) {
      console.error(`Could not load task ${taskId}:`, errorMessage(error));
      return null;
    }

    if (!task) {
      console.error(`Task ${taskId} disappeared before it could run`);
      return null;
    }
    if (task.status !== 'pending') {
      console.warn(`Task ${taskId} is ${task.status}, not pending; skipping run`);
      return null;
    }
    return task;
  }

  private async runParse(task: VideoTask): Promise<VideoTask> {
    const media = await this.resolve(task);
    return this.advance(task, {
      status: 'completed',
      mediaType: media.mediaType,
      metadata: toMetadata(media)
    }, true);
  }

  private async runProcess(initial: VideoTask): Promise<VideoTask> {
    const media = await this.resolve(initial);
    let task = await this.advance(initial, {
      status: 'downloading',
      mediaType: media.mediaType,
      metadata: toMetadata(media)
    });

    const contentDir = path.join(this.options.mediaRoot, contentDirectoryName(media.contentId));

    if (media.mediaType !== 'video') {
      const mediaPaths = await this.downloadAssets(media.assets, contentDir);
      return this.advance(task, { status: 'completed', mediaPaths }, true);
    }

    const best = selectBestVideo(media.assets);
    if (!best) {
      throw new Error('no video stream in resolved media');
    }

    const videoPath = path.join(contentDir, 'video.mp4');
    await withRetry(() => this.deps.fetcher.download(best.url, videoPath), this.networkPolicy, this.retryOptions('download'));
    task = await this.advance(task, { status: 'extracting_audio', videoPath, mediaPaths: [videoPath] });

    const audioPath = await withRetry(
      () => this.deps.extractor.extract(videoPath),
      this.localToolPolicy,
      this.retryOptions('extract audio')
    );
    task = await this.advance(task, { status: 'transcribing', audioPath });

    const transcript = await withRetry(
      () => this.deps.transcriber.transcribe(audioPath),
      this.networkPolicy,
      this.retryOptions('transcribe')
    );
    task = await this.advance(task, { status: 'summarizing', transcript });

    const summary = await withRetry(
      () => this.deps.summarizer.summarize(transcript),
      this.networkPolicy,
      this.retryOptions('summarize')
    );
    return this.advance(task, { status: 'completed', summary });
  }

  private resolve(task: VideoTask): Promise<ParsedMedia> {
    return withRetry(() => this.deps.resolver.resolve(task.sourceUrl), this.networkPolicy, this.retryOptions('resolve'));
  }

  private async downloadAssets(assets: readonly MediaAsset[], contentDir: string): Promise<string[]> {
    const paths: string[] = [];
    let images = 0;
    let clips = 0;

    for (const asset of assets) {
      const name = asset.kind === 'image'
        ? `image_${String(++images).padStart(2, '0')}.jpeg`
        : `live_${String(++clips).padStart(2, '0')}.mp4`;
      const destination = path.join(contentDir, name);

      await withRetry(() => this.deps.fetcher.download(asset.url, destination), this.networkPolicy, this.retryOptions('download'));
      paths.push(destination);
    }

    return paths;
  }

  private async advance(task: VideoTask, patch: TaskPatch, allowShortCircuit = false): Promise<VideoTask> {
    if (!canTransition(task.status, patch.status, allowShortCircuit)) {
      throw new TaskConflictError(`Illegal transition ${task.status} -> ${patch.status} for task ${task.id}`);
    }

    let updated: VideoTask;
    try {
      updated = await this.deps.store.transition(task.id, task.status, patch);
    } catch (error) {
      if (error instanceof TaskConflictError) throw error;
      console.error(`Could not save ${patch.status} for task ${task.id}:`, errorMessage(error));
      throw new TaskPersistenceError(`save progress failed: could not record status ${patch.status}`, { cause: error });
    }
    console.log(`Task ${task.id}: ${task.status} -> ${updated.status}`);
    return updated;
  }

  /**
   * Writes the stage-tagged failure. Returns null when the task is no longer
   * in the status this run left it in.
   */
  private async fail(task: VideoTask, error: unknown): Promise<VideoTask | null> {
    if (error instanceof TaskConflictError) {
      console.error(`Task ${task.id} was modified concurrently: ${error.message}`);
      return null;
    }

    // The row is the source of truth for which stage was running
    let current: VideoTask | null;
    try {
      current = await this.deps.store.findById(task.id);
    } catch (lookupError) {
      console.error(`Could not record failure of task ${task.id}:`, errorMessage(lookupError));
      return null;
    }

    const stage = current ? STAGE_BY_STATUS[current.status] : undefined;
    if (!current || !stage) {
      console.error(`Task ${task.id} failed after reaching ${current?.status ?? 'nothing'}:`, errorMessage(error));
      return null;
    }

    // Store failures are not the stage's fault; their detail stays in the log
    const message = error instanceof TaskPersistenceError ? error.message : `${stage} failed: ${errorMessage(error)}`;
    console.error(`Task ${task.id} ${message}`);

    try {
      return await this.deps.store.transition(task.id, current.status, { status: 'failed', error: message });
    } catch (writeError) {
      console.error(`Could not record failure of task ${task.id}:`, errorMessage(writeError));
      return null;
    }
  }

  private async notify(task: VideoTask): Promise<void> {
    try {
      if (task.status === 'completed') {
        await this.deps.notifier.notifyCompleted(task);
      } else if (task.status === 'failed') {
        await this.deps.notifier.notifyFailed(task);
      }
    } catch (error) {
      console.warn(`Notification for task ${task.id} failed:`, errorMessage(error));
    }
  }

  private retryOptions(stage: PipelineStage): { label: string; sleep?: Sleep } {
    return { label: `${stage} stage`, sleep: this.options.sleep };
  }
}
