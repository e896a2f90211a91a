import { withRetry } from '../utils/retry';
import { logger } from '../utils/logger';
import { EmbeddingServiceError } from '../errors';
import { Embedder } from './embedder';

export interface RetryingEmbedderOptions {
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wraps an embedder with exponential backoff on every EmbeddingServiceError.
 * After the last attempt the error propagates; callers skip and log.
 */
export class RetryingEmbedder implements Embedder {
  constructor(
    private inner: Embedder,
    private options: RetryingEmbedderOptions
  ) {}

  embed(text: string): Promise<number[]> {
    return withRetry(() => this.inner.embed(text), {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.baseDelayMs,
      shouldRetry: error => error instanceof EmbeddingServiceError,
      sleep: this.options.sleep,
      onRetry: ({ attempt, delayMs, error }) => {
        logger.warn(`Embedding attempt ${attempt} failed, retrying`, { delayMs, error });
      },
    });
  }
}
