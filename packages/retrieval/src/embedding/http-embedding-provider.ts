import type { HttpClient } from '@toolgate/connections';
import { EmbeddingError } from '../errors.js';
import type { EmbeddingProvider } from '../types.js';

export interface HttpEmbeddingOptions {
  model: string;
  /** Texts sent per request. */
  batchSize: number;
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === 'number');
}

/** Check that an upstream response field is a list of numeric vectors. */
export function toVectors(value: unknown, providerId: string): number[][] {
  if (!Array.isArray(value) || !value.every(isVector)) {
    throw new EmbeddingError(`${providerId} returned a malformed embedding response`);
  }
  return value;
}

/** Batching and response checks shared by the fetch-based providers. */
export abstract class HttpEmbeddingProvider implements EmbeddingProvider {
  abstract readonly id: string;
  readonly model: string;
  private readonly batchSize: number;

  constructor(
    protected readonly client: HttpClient,
    options: HttpEmbeddingOptions,
  ) {
    this.model = options.model;
    this.batchSize = Math.max(1, options.batchSize);
  }

  protected abstract fetchEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  async embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    const results: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const embeddings = await this.fetchEmbeddings(batch, signal);
      if (embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `${this.id} returned ${embeddings.length} embeddings for ${batch.length} inputs`,
        );
      }
      results.push(...embeddings);
    }

    return results;
  }

  async embedSingle(text: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embed([text], signal);
    if (!embedding) {
      throw new EmbeddingError(`${this.id} returned no embedding`);
    }
    return embedding;
  }
}
