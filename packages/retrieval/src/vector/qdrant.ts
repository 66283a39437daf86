import type { HttpClient } from '@toolgate/connections';
import { isRecord } from '@toolgate/core';
import { VectorStoreError } from '../errors.js';
import type { VectorMatch, VectorStore } from '../types.js';

export interface QdrantStoreOptions {
  collection: string;
  /** Payload field holding the document text. */
  contentKey: string;
  /** Payload field holding document metadata. */
  metadataKey: string;
  scoreThreshold?: number;
}

export const QDRANT_DEFAULTS = {
  contentKey: 'page_content',
  metadataKey: 'metadata',
} as const;

/** Qdrant collection searched over its REST API. */
export class QdrantVectorStore implements VectorStore {
  readonly id = 'qdrant';

  constructor(
    private readonly client: HttpClient,
    private readonly options: QdrantStoreOptions,
  ) {}

  async search(vector: readonly number[], limit: number, signal?: AbortSignal): Promise<VectorMatch[]> {
    const response = await this.client.post<unknown>(
      `collections/${encodeURIComponent(this.options.collection)}/points/search`,
      { vector, limit, with_payload: true, score_threshold: this.options.scoreThreshold },
      signal,
    );
    const points = isRecord(response) ? response['result'] : undefined;
    if (!Array.isArray(points)) {
      throw new VectorStoreError('qdrant returned a malformed search response');
    }
    return points.filter(isRecord).map((point) => this.toMatch(point));
  }

  // fetch() holds no connection to release
  async close(): Promise<void> {}

  private toMatch(point: Record<string, unknown>): VectorMatch {
    const payload = isRecord(point['payload']) ? point['payload'] : {};
    const content = payload[this.options.contentKey];
    const metadata = payload[this.options.metadataKey];
    return {
      id: String(point['id']),
      score: typeof point['score'] === 'number' ? point['score'] : 0,
      content: typeof content === 'string' ? content : '',
      metadata: isRecord(metadata) ? metadata : {},
    };
  }
}
