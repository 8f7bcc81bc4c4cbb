import path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { randomUUID } from 'crypto';
import { AxiosInstance } from 'axios';
import { DownloadError } from '../errors.js';
import { classifyHttpError, isRetryableStatus } from '../utils/httpErrors.js';
import { FileManager, MediaFetcher } from './interfaces/PipelineServices.js';

// Some CDNs refuse requests without a browser user agent and referer
const DEFAULT_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Referer: 'https://www.douyin.com/'
};

// Node's stream AbortError comes from another realm under some runners, so match by name
function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export interface MediaDownloadOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

/**
 * Media Download Service - streams a remote file to a stable local path.
 *
 * The body is written to a temporary sibling and renamed over the
 * destination only after the stream finished, so a failed download never
 * leaves a partial file and a repeated download replaces the previous one.
 */
export class MediaDownloadService implements MediaFetcher {
  constructor(
    private readonly http: AxiosInstance,
    private readonly fileManager: FileManager,
    private readonly options: MediaDownloadOptions
  ) {}

  async download(url: string, destination: string): Promise<number> {
    this.fileManager.ensureDirectory(path.dirname(destination));
    const partialPath = `${destination}.${randomUUID()}.part`;

    console.log(`Starting download to ${destination}...`);

    try {
      const response = await this.http.get(url, {
        responseType: 'stream',
        timeout: this.options.timeoutMs,
        headers: { ...DEFAULT_HEADERS, ...this.options.headers },
        validateStatus: () => true
      });

      const body: unknown = response.data;
      if (response.status < 200 || response.status >= 300) {
        if (body instanceof Readable) body.destroy();
        throw new DownloadError(`media server responded with HTTP ${response.status}`, {
          retryable: isRetryableStatus(response.status)
        });
      }
      if (!(body instanceof Readable)) {
        throw new DownloadError('media server returned no body stream');
      }

      let bytesWritten = 0;
      const counter = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          bytesWritten += chunk.length;
          callback(null, chunk);
        }
      });

      await pipeline(
        body,
        counter,
        this.fileManager.createWriteStream(partialPath),
        { signal: AbortSignal.timeout(this.options.timeoutMs) }
      );
      await this.fileManager.replace(partialPath, destination);

      console.log(`Download complete: ${destination} (${(bytesWritten / (1024 * 1024)).toFixed(2)}MB)`);
      return bytesWritten;
    } catch (error) {
      this.fileManager.cleanup(partialPath);

      if (error instanceof DownloadError) throw error;
      if (isAbortError(error)) {
        throw new DownloadError('download timed out', { retryable: true, cause: error });
      }
      const failure = classifyHttpError(error);
      throw new DownloadError(failure.message, { retryable: failure.retryable, cause: error });
    }
  }
}
