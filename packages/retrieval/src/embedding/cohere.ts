import type { HttpClient } from '@toolgate/connections';
import { isRecord } from '@toolgate/core';
import { HttpEmbeddingProvider, toVectors, type HttpEmbeddingOptions } from './http-embedding-provider.js';

export const COHERE_DEFAULTS = {
  baseUrl: 'https://api.cohere.com/v1',
  model: 'embed-english-v3.0',
  batchSize: 96,
  inputType: 'search_query',
} as const;

export interface CohereEmbeddingOptions extends HttpEmbeddingOptions {
  inputType: string;
}

export class CohereEmbeddingProvider extends HttpEmbeddingProvider {
  readonly id = 'cohere';
  private readonly inputType: string;

  constructor(client: HttpClient, options: CohereEmbeddingOptions) {
    super(client, options);
    this.inputType = options.inputType;
  }

  protected async fetchEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.client.post<unknown>(
      'embed',
      { model: this.model, texts, input_type: this.inputType, truncate: 'END' },
      signal,
    );
    return toVectors(isRecord(response) ? response['embeddings'] : undefined, this.id);
  }
}
