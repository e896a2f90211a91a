import { Config } from '../config';
import { Embedder, OpenAIEmbedder } from './embedder';
import { RetryingEmbedder } from './retrying-embedder';

export type { Embedder } from './embedder';
export { OpenAIEmbedder } from './embedder';
export { RetryingEmbedder } from './retrying-embedder';

/**
 * Factory for the embedder used by ingestion and CV intake
 */
export function createEmbedder(config: Config): Embedder {
  return new RetryingEmbedder(
    new OpenAIEmbedder({
      apiKey: config.openai.apiKey,
      model: config.openai.embeddingModel,
      maxInputChars: config.openai.maxInputChars,
    }),
    {
      maxAttempts: config.embeddingMaxAttempts,
      baseDelayMs: config.embeddingRetryBaseMs,
    }
  );
}
