import OpenAI from 'openai';
import { EmbeddingServiceError, errorMessage } from '../errors';
import { cleanText, truncateText } from '../utils/text';

/**
 * Converts free text into a fixed-length vector
 */
export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface OpenAIEmbedderOptions {
  apiKey: string;
  model: string;
  maxInputChars: number;
  timeoutMs?: number;
}

/**
 * Embedder backed by the OpenAI embeddings endpoint.
 * SDK-level retries are disabled; callers retry with their own backoff.
 */
export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;

  constructor(private options: OpenAIEmbedderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      maxRetries: 0,
      timeout: options.timeoutMs ?? 30_000,
    });
  }

  async embed(text: string): Promise<number[]> {
    const input = prepareEmbeddingInput(text, this.options.maxInputChars);
    if (input.length === 0) {
      throw new EmbeddingServiceError('Cannot embed empty text');
    }

    let vector: number[] | undefined;
    try {
      const response = await this.client.embeddings.create({
        model: this.options.model,
        input,
      });
      vector = response.data[0]?.embedding;
    } catch (error) {
      throw toEmbeddingServiceError(error);
    }

    if (!vector || vector.length === 0) {
      throw new EmbeddingServiceError('Embedding service returned no vector');
    }
    return vector;
  }
}

export function prepareEmbeddingInput(text: string, maxInputChars: number): string {
  return truncateText(cleanText(text), maxInputChars);
}

/**
 * Wraps any SDK failure; the HTTP status is kept when the service answered
 */
export function toEmbeddingServiceError(error: unknown): EmbeddingServiceError {
  if (error instanceof EmbeddingServiceError) return error;

  if (error instanceof OpenAI.APIConnectionError) {
    return new EmbeddingServiceError(`Embedding request failed: ${error.message}`, { cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    return new EmbeddingServiceError(`Embedding service returned ${status ?? 'an error'}: ${error.message}`, {
      cause: error,
      status,
    });
  }

  return new EmbeddingServiceError(`Embedding request failed: ${errorMessage(error)}`, { cause: error });
}
