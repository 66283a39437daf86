import { isRecord } from '@toolgate/core';
import { HttpEmbeddingProvider, toVectors } from './http-embedding-provider.js';

export const OLLAMA_DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'nomic-embed-text',
  batchSize: 32,
} as const;

/** Local Ollama server, `/api/embed`. */
export class OllamaEmbeddingProvider extends HttpEmbeddingProvider {
  readonly id = 'ollama';

  protected async fetchEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.client.post<unknown>('api/embed', { model: this.model, input: texts }, signal);
    return toVectors(isRecord(response) ? response['embeddings'] : undefined, this.id);
  }
}
