import { AxiosInstance } from 'axios';
import { OpenAICompatibleAdapter } from '../adapters/OpenAICompatibleAdapter.js';
import { SummarizationService, TranscriptionService } from '../AIServices.js';
import { AIConfig } from '../ConfigService.js';
import { AIProvider, SummarizationClient, TranscriptionClient } from '../interfaces/PipelineServices.js';

export interface AIClients {
  transcriber: TranscriptionClient;
  summarizer: SummarizationClient;
}

/**
 * Both supported providers speak the same REST dialect; only the config
 * (base URL, key, models) differs between them.
 */
export class AIClientFactory {
  static createProvider(config: AIConfig, http: AxiosInstance): AIProvider {
    switch (config.provider) {
      case 'siliconflow':
      case 'openai':
        return new OpenAICompatibleAdapter(http, config);
    }
  }

  static create(config: AIConfig, http: AxiosInstance): AIClients {
    const provider = AIClientFactory.createProvider(config, http);
    console.log(`Using ${provider.name} for transcription (${config.transcriptionModel}) and summaries (${config.summaryModel})`);
    return {
      transcriber: new TranscriptionService(provider),
      summarizer: new SummarizationService(provider)
    };
  }
}
