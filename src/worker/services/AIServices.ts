import { AIServiceError, errorMessage } from '../errors.js';
import { AIProvider, SummarizationClient, TranscriptionClient } from './interfaces/PipelineServices.js';

/** Transcripts shorter than this (after trimming) are not worth a model call. */
export const MIN_SUMMARIZABLE_CHARS = 10;

export const EMPTY_TRANSCRIPT_SUMMARY = 'No spoken content was detected in this video.';

function asServiceError(provider: AIProvider, operation: string, error: unknown): AIServiceError {
  if (error instanceof AIServiceError) return error;
  return new AIServiceError(`${provider.name} ${operation} failed: ${errorMessage(error)}`, { cause: error });
}

export class TranscriptionService implements TranscriptionClient {
  constructor(private readonly provider: AIProvider) {}

  async transcribe(audioPath: string): Promise<string> {
    try {
      const text = await this.provider.recognizeSpeech(audioPath);
      console.log(`Speech recognition via ${this.provider.name} returned ${text.length} characters`);
      return text;
    } catch (error) {
      throw asServiceError(this.provider, 'speech recognition', error);
    }
  }
}

export class SummarizationService implements SummarizationClient {
  constructor(private readonly provider: AIProvider) {}

  async summarize(text: string): Promise<string> {
    if (text.trim().length < MIN_SUMMARIZABLE_CHARS) {
      console.log('Transcript is empty or too short, skipping summarization');
      return EMPTY_TRANSCRIPT_SUMMARY;
    }

    try {
      const summary = await this.provider.summarizeText(text);
      if (!summary) {
        throw new AIServiceError(`${this.provider.name} summarization returned an empty summary`, { retryable: true });
      }
      return summary;
    } catch (error) {
      throw asServiceError(this.provider, 'summarization', error);
    }
  }
}
