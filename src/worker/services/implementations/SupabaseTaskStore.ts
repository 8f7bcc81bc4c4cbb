import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { TaskConflictError } from '../../errors.js';
import { InsertResult, TaskStore } from '../interfaces/TaskStore.js';
import {
  ACTIVE_STATUSES,
  MediaType,
  NewVideoTask,
  TaskPatch,
  TaskStatus,
  TaskType,
  VideoTask
} from '../types/task.js';

export const VIDEO_TASKS_TABLE = 'video_tasks';

// Postgres unique_violation, raised by the partial index on in-flight process tasks
const UNIQUE_VIOLATION = '23505';

export interface VideoTaskRow {
  id: string;
  user_id: string;
  task_type: TaskType;
  source_url: string;
  status: TaskStatus;
  media_type: MediaType | null;
  content_id: string | null;
  description: string | null;
  author: string | null;
  download_urls: string[] | null;
  media_paths: string[] | null;
  video_path: string | null;
  audio_path: string | null;
  transcript: string | null;
  summary: string | null;
  error_message: string | null;
  created_at: string;
  updated_at: string;
}

type VideoTaskRowUpdate = Partial<Omit<VideoTaskRow, 'id' | 'user_id' | 'task_type' | 'source_url' | 'created_at'>>;

export class TaskStoreError extends Error {
  constructor(message: string, public readonly code?: string, public readonly details?: unknown) {
    super(message);
    this.name = 'TaskStoreError';
  }
}

export function toVideoTask(row: VideoTaskRow): VideoTask {
  return {
    id: row.id,
    owner: row.user_id,
    taskType: row.task_type,
    sourceUrl: row.source_url,
    status: row.status,
    mediaType: row.media_type,
    metadata: row.content_id === null
      ? null
      : {
          contentId: row.content_id,
          description: row.description ?? '',
          author: row.author ?? '',
          downloadUrls: row.download_urls ?? []
        },
    mediaPaths: row.media_paths,
    videoPath: row.video_path,
    audioPath: row.audio_path,
    transcript: row.transcript,
    summary: row.summary,
    error: row.error_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export function toRowUpdate(patch: TaskPatch, updatedAt: string): VideoTaskRowUpdate {
  const update: VideoTaskRowUpdate = { status: patch.status, updated_at: updatedAt };

  if (patch.mediaType !== undefined) update.media_type = patch.mediaType;
  if (patch.metadata !== undefined) {
    update.content_id = patch.metadata?.contentId ?? null;
    update.description = patch.metadata?.description ?? null;
    update.author = patch.metadata?.author ?? null;
    update.download_urls = patch.metadata?.downloadUrls ?? null;
  }
  if (patch.mediaPaths !== undefined) update.media_paths = patch.mediaPaths;
  if (patch.videoPath !== undefined) update.video_path = patch.videoPath;
  if (patch.audioPath !== undefined) update.audio_path = patch.audioPath;
  if (patch.transcript !== undefined) update.transcript = patch.transcript;
  if (patch.summary !== undefined) update.summary = patch.summary;
  if (patch.error !== undefined) update.error_message = patch.error;

  return update;
}

/**
 * TaskStore backed by the `video_tasks` table through PostgREST.
 * Every transition is a single UPDATE filtered on the expected status.
 */
export class SupabaseTaskStore implements TaskStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  async insert(task: NewVideoTask): Promise<InsertResult> {
    const timestamp = this.now().toISOString();
    const { data, error } = await this.supabase
      .from(VIDEO_TASKS_TABLE)
      .insert({
        id: task.id,
        user_id: task.owner,
        task_type: task.taskType,
        source_url: task.sourceUrl,
        status: 'pending',
        created_at: timestamp,
        updated_at: timestamp
      })
      .select();

    if (error) {
      if (error.code === UNIQUE_VIOLATION && task.taskType === 'process') {
        const existing = await this.findInFlight(task.owner, task.sourceUrl);
        if (existing) {
          console.log(`Submission for ${task.sourceUrl} deduplicated to in-flight task ${existing.id}`);
          return { task: existing, created: false };
        }
      }
      throw this.wrap('Error creating video task', error);
    }

    const rows: VideoTaskRow[] = data ?? [];
    if (rows.length === 0) {
      throw new TaskStoreError(`Insert of task ${task.id} returned no row`);
    }
    return { task: toVideoTask(rows[0]), created: true };
  }

  async findById(id: string): Promise<VideoTask | null> {
    const { data, error } = await this.supabase
      .from(VIDEO_TASKS_TABLE)
      .select('*')
      .eq('id', id)
      .limit(1);

    if (error) {
      throw this.wrap('Error fetching video task', error);
    }

    const rows: VideoTaskRow[] = data ?? [];
    return rows.length > 0 ? toVideoTask(rows[0]) : null;
  }

  async findInFlight(owner: string, sourceUrl: string): Promise<VideoTask | null> {
    const { data, error } = await this.supabase
      .from(VIDEO_TASKS_TABLE)
      .select('*')
      .eq('user_id', owner)
      .eq('source_url', sourceUrl)
      .eq('task_type', 'process')
      .in('status', [...ACTIVE_STATUSES])
      .limit(1);

    if (error) {
      throw this.wrap('Error looking up in-flight task', error);
    }

    const rows: VideoTaskRow[] = data ?? [];
    return rows.length > 0 ? toVideoTask(rows[0]) : null;
  }

  async listInFlight(): Promise<VideoTask[]> {
    const { data, error } = await this.supabase
      .from(VIDEO_TASKS_TABLE)
      .select('*')
      .in('status', [...ACTIVE_STATUSES]);

    if (error) {
      throw this.wrap('Error listing in-flight tasks', error);
    }

    const rows: VideoTaskRow[] = data ?? [];
    return rows.map(toVideoTask);
  }

  async transition(id: string, expected: TaskStatus, patch: TaskPatch): Promise<VideoTask> {
    const { data, error } = await this.supabase
      .from(VIDEO_TASKS_TABLE)
      .update(toRowUpdate(patch, this.now().toISOString()))
      .eq('id', id)
      .eq('status', expected)
      .select();

    if (error) {
      throw this.wrap(`Error updating video task ${id}`, error);
    }

    const rows: VideoTaskRow[] = data ?? [];
    if (rows.length === 0) {
      throw new TaskConflictError(`Task ${id} is not in status ${expected}`);
    }
    return toVideoTask(rows[0]);
  }

  private wrap(message: string, error: PostgrestError): TaskStoreError {
    console.error(`${message}:`, error);
    return new TaskStoreError(`${message}: ${error.message}`, error.code, error);
  }
}
