import fs from 'fs';
import path from 'path';
import { AxiosInstance } from 'axios';
import { AIServiceError } from '../../errors.js';
import { classifyHttpError } from '../../utils/httpErrors.js';
import { AIConfig } from '../ConfigService.js';
import { AIProvider } from '../interfaces/PipelineServices.js';

const SUMMARY_PROMPT = `Summarize the following video transcript.

Requirements:
1. Extract the key information, main points and core content
2. Keep important details and figures
3. Present it in a clear, structured way
4. Where possible, end with actionable advice or conclusions
5. Write concisely, in the language of the transcript

Transcript:`;

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

function isChatCompletion(value: unknown): value is ChatCompletionResponse {
  return typeof value === 'object' && value !== null && 'choices' in value && Array.isArray(value.choices);
}

/**
 * Provider speaking the OpenAI REST dialect. SiliconFlow exposes the same
 * `/audio/transcriptions` and `/chat/completions` endpoints, so both
 * providers only differ in base URL, key and model names.
 */
export class OpenAICompatibleAdapter implements AIProvider {
  readonly name: string;

  constructor(
    private readonly http: AxiosInstance,
    private readonly config: AIConfig
  ) {
    this.name = config.provider;
  }

  async recognizeSpeech(audioPath: string): Promise<string> {
    this.ensureApiKey();

    const form = new FormData();
    const audio = await fs.promises.readFile(audioPath);
    form.append('file', new Blob([audio], { type: 'audio/mpeg' }), path.basename(audioPath));
    form.append('model', this.config.transcriptionModel);
    form.append('response_format', 'json');

    const data = await this.post('/audio/transcriptions', form, 'speech recognition');

    if (typeof data === 'string') return data.trim();
    if (typeof data === 'object' && data !== null && 'text' in data && typeof data.text === 'string') {
      return data.text.trim();
    }
    throw new AIServiceError(`${this.name} speech recognition returned an unexpected response`);
  }

  async summarizeText(text: string): Promise<string> {
    this.ensureApiKey();

    const data = await this.post(
      '/chat/completions',
      {
        model: this.config.summaryModel,
        messages: [
          { role: 'system', content: SUMMARY_PROMPT },
          { role: 'user', content: text }
        ],
        temperature: 0.3,
        max_tokens: 2000
      },
      'summarization'
    );

    const content = isChatCompletion(data) ? data.choices?.[0]?.message?.content : undefined;
    if (typeof content !== 'string') {
      throw new AIServiceError(`${this.name} summarization returned an unexpected response`);
    }
    return content.trim();
  }

  private async post(endpoint: string, body: FormData | object, operation: string): Promise<unknown> {
    try {
      const response = await this.http.post(`${this.config.baseUrl}${endpoint}`, body, {
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        timeout: this.config.timeoutMs
      });
      return response.data;
    } catch (error) {
      const failure = classifyHttpError(error);
      console.error(`${this.name} ${operation} request failed: ${failure.message}`);
      throw new AIServiceError(`${this.name} ${operation} failed: ${failure.message}`, {
        retryable: failure.retryable,
        cause: error
      });
    }
  }

  private ensureApiKey(): void {
    if (!this.config.apiKey) {
      throw new AIServiceError(`${this.name} API key is not configured`);
    }
  }
}
