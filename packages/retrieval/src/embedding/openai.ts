import type { HttpClient } from '@toolgate/connections';
import { isRecord } from '@toolgate/core';
import { EmbeddingError } from '../errors.js';
import { HttpEmbeddingProvider, toVectors, type HttpEmbeddingOptions } from './http-embedding-provider.js';

export const OPENAI_DEFAULTS = {
  baseUrl: 'https://api.openai.com/v1',
  model: 'text-embedding-3-small',
  batchSize: 100,
} as const;

export interface OpenAIEmbeddingOptions extends HttpEmbeddingOptions {
  /** Output size for models that support shortening. */
  dimensions?: number;
}

/** OpenAI `/embeddings` over fetch (no SDK dependency). */
export class OpenAIEmbeddingProvider extends HttpEmbeddingProvider {
  readonly id = 'openai';
  private readonly dimensions?: number;

  constructor(client: HttpClient, options: OpenAIEmbeddingOptions) {
    super(client, options);
    this.dimensions = options.dimensions;
  }

  protected async fetchEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.client.post<unknown>(
      'embeddings',
      { model: this.model, input: texts, dimensions: this.dimensions },
      signal,
    );
    const data = isRecord(response) ? response['data'] : undefined;
    if (!Array.isArray(data)) {
      throw new EmbeddingError('openai returned a malformed embedding response');
    }

    // Sort by index to preserve input order
    const sorted = data
      .filter(isRecord)
      .map((item) => ({ index: typeof item['index'] === 'number' ? item['index'] : 0, embedding: item['embedding'] }))
      .sort((a, b) => a.index - b.index);
    return toVectors(sorted.map((d) => d.embedding), this.id);
  }
}
