import type { ToolSpec } from '@toolgate/core';
import { getNumber } from '@toolgate/core';
import {
  GuardedTool,
  descendingBy,
  listOutput,
  valueOutput,
  type ToolOperation,
  type ToolProviderDescriptor,
} from '@toolgate/tools';
import { EmbeddingManager, VectorStoreManager } from './managers.js';
import type { EmbeddingProvider, VectorMatch, VectorStore } from './types.js';

export const KNOWLEDGE_CATEGORY = 'knowledge';

interface KnowledgeHandle {
  embeddings: EmbeddingProvider;
  store: VectorStore;
}

export const knowledgeSearchSpec: ToolSpec = {
  name: 'knowledge_search',
  description:
    'Semantic search over the knowledge base (runbooks, Confluence pages, past incident notes). ' +
    'Returns the closest passages, best match first.',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'What to look for, in natural language' },
      limit: { type: 'integer', description: 'Maximum number of passages' },
    },
    required: ['query'],
  },
  limitParam: 'limit',
};

const knowledgeSearch: ToolOperation<KnowledgeHandle> = {
  spec: knowledgeSearchSpec,
  cacheable: true,
  async run({ handle, args, limit, signal, config }) {
    const query = String(args['query']).trim();
    if (query === '') {
      return valueOutput('Provide a non-empty query.');
    }

    const vector = await handle.embeddings.embedSingle(query, signal);
    const matches = await handle.store.search(vector, limit, signal);
    const minScore = getNumber(config, 'minScore');
    const kept = minScore === undefined ? matches : matches.filter((m) => m.score >= minScore);
    return listOutput(kept, descendingBy((m: VectorMatch) => m.score));
  },
};

/** `knowledge_search` over the configured embedding provider and vector store. */
export function knowledgeTools(): ToolProviderDescriptor {
  return {
    category: KNOWLEDGE_CATEGORY,
    definitions: [knowledgeSearchSpec],
    defaultPolicy: { defaultLimit: 5, maxLimit: 20, timeoutMs: 20_000 },
    createTool({ config, logger, policies, resultCache }) {
      const embeddings = new EmbeddingManager({ config, logger });
      const vectors = new VectorStoreManager({ config, logger });
      return new GuardedTool<KnowledgeHandle>({
        category: KNOWLEDGE_CATEGORY,
        config,
        logger,
        operations: [knowledgeSearch],
        policies,
        resultCache,
        connect: async () => {
          const [embedder, store] = await Promise.all([embeddings.getClient(), vectors.getClient()]);
          return { embeddings: embedder, store };
        },
        close: async () => {
          await Promise.all([embeddings.closeAll(), vectors.closeAll()]);
        },
      });
    },
  };
}
