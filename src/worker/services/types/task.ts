export type TaskType = 'process' | 'parse';

export type TaskStatus =
  | 'pending'
  | 'downloading'
  | 'extracting_audio'
  | 'transcribing'
  | 'summarizing'
  | 'completed'
  | 'failed';

export type MediaType = 'video' | 'image' | 'live_photo';

export interface MediaMetadata {
  contentId: string;
  description: string;
  author: string;
  downloadUrls: string[];
}

export interface VideoTask {
  id: string;
  owner: string;
  taskType: TaskType;
  sourceUrl: string;
  status: TaskStatus;
  mediaType: MediaType | null;
  metadata: MediaMetadata | null;
  mediaPaths: string[] | null;
  videoPath: string | null;
  audioPath: string | null;
  transcript: string | null;
  summary: string | null;
  error: string | null;
  createdAt: string;
  updatedAt: string;
}

export type NewVideoTask = Pick<VideoTask, 'id' | 'owner' | 'taskType' | 'sourceUrl'>;

/**
 * Fields the orchestrator may write together with a status transition.
 * Identity fields and timestamps are owned by the store.
 */
export type TaskPatch = Partial<
  Pick<
    VideoTask,
    | 'mediaType'
    | 'metadata'
    | 'mediaPaths'
    | 'videoPath'
    | 'audioPath'
    | 'transcript'
    | 'summary'
    | 'error'
  >
> & { status: TaskStatus };

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed'];

export const ACTIVE_STATUSES: readonly TaskStatus[] = [
  'pending',
  'downloading',
  'extracting_audio',
  'transcribing',
  'summarizing'
];

const STAGE_ORDER: readonly TaskStatus[] = [...ACTIVE_STATUSES, 'completed'];

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Forward-only transitions. Any active status may fail; otherwise a status
 * may only advance to the next stage, except that parse tasks and non-video
 * media may jump to `completed`.
 */
export function canTransition(from: TaskStatus, to: TaskStatus, allowShortCircuit = false): boolean {
  if (isTerminal(from)) return false;
  if (to === 'failed') return true;

  const fromIndex = STAGE_ORDER.indexOf(from);
  const toIndex = STAGE_ORDER.indexOf(to);

  if (toIndex === fromIndex + 1) return true;
  return allowShortCircuit && to === 'completed' && toIndex > fromIndex;
}
