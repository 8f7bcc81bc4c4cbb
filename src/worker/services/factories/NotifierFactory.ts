import { AxiosInstance } from 'axios';
import { BarkNotifier, NoopNotifier } from '../adapters/BarkNotifier.js';
import { NotifierConfig } from '../ConfigService.js';
import { TaskNotifier } from '../interfaces/PipelineServices.js';

export class NotifierFactory {
  static create(config: NotifierConfig, http: AxiosInstance): TaskNotifier {
    const { barkBaseUrl, barkDeviceKey } = config;
    if (!barkDeviceKey) {
      return new NoopNotifier();
    }
    return new BarkNotifier(http, { barkBaseUrl, barkDeviceKey });
  }
}
