import { WriteStream } from 'fs';
import { MediaType, VideoTask } from '../types/task.js';

export type AssetKind = 'video' | 'image';

export interface MediaAsset {
  url: string;
  kind: AssetKind;
  bitRate?: number;
  label?: string;
}

export interface ParsedMedia {
  contentId: string;
  description: string;
  author: string;
  mediaType: MediaType;
  assets: MediaAsset[];
}

export interface MediaResolver {
  resolve(url: string): Promise<ParsedMedia>;
}

export interface MediaFetcher {
  download(url: string, destination: string): Promise<number>;
}

export interface AudioExtractor {
  extract(videoPath: string): Promise<string>;
}

export interface TranscriptionClient {
  transcribe(audioPath: string): Promise<string>;
}

export interface SummarizationClient {
  summarize(text: string): Promise<string>;
}

/**
 * Raw provider behind the transcription/summarization clients.
 */
export interface AIProvider {
  readonly name: string;
  recognizeSpeech(audioPath: string): Promise<string>;
  summarizeText(text: string): Promise<string>;
}

export interface TaskNotifier {
  notifyCompleted(task: VideoTask): Promise<void>;
  notifyFailed(task: VideoTask): Promise<void>;
}

export interface FileManager {
  ensureDirectory(dir: string): void;
  createWriteStream(path: string): WriteStream;
  replace(from: string, to: string): Promise<void>;
  cleanup(path: string): void;
  exists(path: string): boolean;
}

export interface TaskDispatcher {
  dispatch(taskId: string, job: () => Promise<void>): void;
}
