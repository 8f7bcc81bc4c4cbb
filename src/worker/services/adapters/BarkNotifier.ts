import { AxiosInstance } from 'axios';
import { NotifierConfig } from '../ConfigService.js';
import { TaskNotifier } from '../interfaces/PipelineServices.js';
import { VideoTask } from '../types/task.js';

const PREVIEW_LENGTH = 200;

/**
 * Pushes terminal task states to a Bark device:
 * GET <base>/<deviceKey>/<title>/<body>?level=...
 */
export class BarkNotifier implements TaskNotifier {
  constructor(
    private readonly http: AxiosInstance,
    private readonly config: NotifierConfig & { barkDeviceKey: string }
  ) {}

  async notifyCompleted(task: VideoTask): Promise<void> {
    const preview = (task.summary ?? task.metadata?.description ?? '').slice(0, PREVIEW_LENGTH);
    await this.push('Video task completed', `Task ${task.id}\n${preview}`, 'active');
  }

  async notifyFailed(task: VideoTask): Promise<void> {
    await this.push('Video task failed', `Task ${task.id}\n${task.error ?? 'unknown error'}`, 'timeSensitive');
  }

  private async push(title: string, body: string, level: string): Promise<void> {
    const url = [
      this.config.barkBaseUrl.replace(/\/+$/, ''),
      encodeURIComponent(this.config.barkDeviceKey),
      encodeURIComponent(title),
      encodeURIComponent(body)
    ].join('/');

    await this.http.get(url, { params: { level, group: 'video-tasks' }, timeout: 10000 });
  }
}

export class NoopNotifier implements TaskNotifier {
  async notifyCompleted(): Promise<void> {}

  async notifyFailed(): Promise<void> {}
}
