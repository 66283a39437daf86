import type { HttpClient } from '@toolgate/connections';
import { isRecord } from '@toolgate/core';
import { VectorStoreError } from '../errors.js';
import type { VectorMatch, VectorStore } from '../types.js';

function firstRow(response: Record<string, unknown>, key: string): unknown[] {
  const rows = response[key];
  if (!Array.isArray(rows)) return [];
  const first: unknown = rows[0];
  return Array.isArray(first) ? first : [];
}

/**
 * Look up a Chroma collection's id by name. Queries address collections by
 * id, so this runs once when the store is built.
 */
export async function resolveChromaCollection(client: HttpClient, name: string): Promise<string> {
  const collection = await client.get<unknown>(`api/v1/collections/${encodeURIComponent(name)}`);
  const id = isRecord(collection) ? collection['id'] : undefined;
  if (typeof id !== 'string' || id === '') {
    throw new VectorStoreError(`chromadb collection "${name}" has no id`);
  }
  return id;
}

/** Chroma collection searched over its REST API. Distances become `1 - distance` scores. */
export class ChromaVectorStore implements VectorStore {
  readonly id = 'chromadb';

  constructor(
    private readonly client: HttpClient,
    private readonly collectionId: string,
  ) {}

  async search(vector: readonly number[], limit: number, signal?: AbortSignal): Promise<VectorMatch[]> {
    const response = await this.client.post<unknown>(
      `api/v1/collections/${encodeURIComponent(this.collectionId)}/query`,
      {
        query_embeddings: [vector],
        n_results: limit,
        include: ['documents', 'metadatas', 'distances'],
      },
      signal,
    );
    if (!isRecord(response)) {
      throw new VectorStoreError('chromadb returned a malformed query response');
    }

    const ids = firstRow(response, 'ids');
    const documents = firstRow(response, 'documents');
    const metadatas = firstRow(response, 'metadatas');
    const distances = firstRow(response, 'distances');

    return ids.map((id, i) => {
      const document = documents[i];
      const metadata = metadatas[i];
      const distance = distances[i];
      return {
        id: String(id),
        score: typeof distance === 'number' ? 1 - distance : 0,
        content: typeof document === 'string' ? document : '',
        metadata: isRecord(metadata) ? metadata : {},
      };
    });
  }

  async close(): Promise<void> {}
}
