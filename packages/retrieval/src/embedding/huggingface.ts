import { HttpEmbeddingProvider, toVectors } from './http-embedding-provider.js';

export const HUGGINGFACE_DEFAULTS = {
  baseUrl: 'https://api-inference.huggingface.co',
  model: 'sentence-transformers/all-MiniLM-L6-v2',
  batchSize: 32,
} as const;

/** Hugging Face Inference API feature-extraction pipeline. */
export class HuggingFaceEmbeddingProvider extends HttpEmbeddingProvider {
  readonly id = 'huggingface';

  protected async fetchEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.client.post<unknown>(
      `pipeline/feature-extraction/${this.model}`,
      { inputs: texts, options: { wait_for_model: true } },
      signal,
    );
    return toVectors(response, this.id);
  }
}
