/** Turns text into vectors. One instance per configured embedding provider. */
export interface EmbeddingProvider {
  readonly id: string;
  readonly model: string;
  embed(texts: readonly string[], signal?: AbortSignal): Promise<number[][]>;
  embedSingle(text: string, signal?: AbortSignal): Promise<number[]>;
}

/** One document returned by a similarity search. Higher scores are closer. */
export interface VectorMatch {
  id: string;
  score: number;
  content: string;
  metadata: Record<string, unknown>;
}

/** Read side of a vector store: nearest-neighbour search over one collection. */
export interface VectorStore {
  readonly id: string;
  search(vector: readonly number[], limit: number, signal?: AbortSignal): Promise<VectorMatch[]>;
  close(): Promise<void>;
}
