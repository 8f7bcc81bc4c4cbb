import { spawn } from 'child_process';
import { randomUUID } from 'crypto';
import path from 'path';
import { ExtractionError } from '../../errors.js';
import { AudioExtractor, FileManager } from '../interfaces/PipelineServices.js';

export interface FfmpegOptions {
  ffmpegPath: string;
  timeoutMs: number;
}

interface ProcessResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  timedOut: boolean;
}

// Keep only the tail of ffmpeg's chatty stderr for error messages
const STDERR_TAIL = 500;

/**
 * Extracts an MP3 track next to the source video (`<dir>/audio.mp3`).
 * The source file is only read.
 */
export class FfmpegAudioExtractor implements AudioExtractor {
  constructor(
    private readonly fileManager: FileManager,
    private readonly options: FfmpegOptions
  ) {}

  async extract(videoPath: string): Promise<string> {
    if (!this.fileManager.exists(videoPath)) {
      throw new ExtractionError(`video file not found: ${videoPath}`);
    }

    const audioPath = path.join(path.dirname(videoPath), 'audio.mp3');
    const tempPath = path.join(path.dirname(videoPath), `audio.${randomUUID()}.mp3`);
    const args = ['-i', videoPath, '-vn', '-acodec', 'libmp3lame', '-ab', '192k', '-y', tempPath];

    console.log(`Running ${this.options.ffmpegPath} ${args.join(' ')}`);

    try {
      const result = await this.run(args);

      if (result.timedOut) {
        throw new ExtractionError(`ffmpeg timed out after ${this.options.timeoutMs}ms`, { retryable: true });
      }
      if (result.code !== 0) {
        const reason = result.signal ? `signal ${result.signal}` : `exit code ${result.code}`;
        throw new ExtractionError(`ffmpeg failed with ${reason}: ${result.stderr.trim().slice(-STDERR_TAIL)}`, {
          retryable: result.signal !== null
        });
      }
      if (!this.fileManager.exists(tempPath)) {
        throw new ExtractionError('ffmpeg produced no audio file', { retryable: true });
      }

      await this.fileManager.replace(tempPath, audioPath);
      console.log(`Audio extracted to ${audioPath}`);
      return audioPath;
    } catch (error) {
      this.fileManager.cleanup(tempPath);
      throw error;
    }
  }

  private run(args: string[]): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.options.ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, this.options.timeoutMs);

      child.stderr?.on('data', (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-STDERR_TAIL * 4);
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timer);
        const missing = error.code === 'ENOENT';
        reject(new ExtractionError(
          missing ? `ffmpeg not found at ${this.options.ffmpegPath}` : `failed to start ffmpeg: ${error.message}`,
          { retryable: !missing, cause: error }
        ));
      });

      child.on('close', (code, signal) => {
        clearTimeout(timer);
        resolve({ code, signal, stderr, timedOut });
      });
    });
  }
}
