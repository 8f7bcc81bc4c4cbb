import { isAxiosError } from 'axios';

const RETRYABLE_NETWORK_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
  'ERR_NETWORK',
  'ERR_CANCELED'
]);

export interface HttpFailure {
  message: string;
  retryable: boolean;
}

export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 429 || status === 408;
}

/**
 * Normalizes whatever axios threw into a short message plus a retry verdict.
 * Response bodies are deliberately left out of the message.
 */
export function classifyHttpError(error: unknown): HttpFailure {
  if (isAxiosError(error)) {
    if (error.response) {
      const { status } = error.response;
      return { message: `HTTP ${status}`, retryable: isRetryableStatus(status) };
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return { message: 'request timed out', retryable: true };
    }
    return {
      message: error.code ? `network error (${error.code})` : error.message,
      retryable: error.code === undefined || RETRYABLE_NETWORK_CODES.has(error.code)
    };
  }

  const code = typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : undefined;
  if (code && RETRYABLE_NETWORK_CODES.has(code)) {
    return { message: `network error (${code})`, retryable: true };
  }
  return { message: error instanceof Error ? error.message : String(error), retryable: false };
}
