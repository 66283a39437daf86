import pg from 'pg';
import type { ConfigProvider, Logger, ResolvedConfig } from '@toolgate/core';
import { ConfigurationError, getNumber, getString, requireKeys } from '@toolgate/core';
import {
  HttpClient,
  ProviderFactory,
  type ProviderBuildContext,
  type ProviderBuilder,
} from '@toolgate/connections';
import type { VectorStore } from '../types.js';
import { ChromaVectorStore, resolveChromaCollection } from './chromadb.js';
import { isDistanceStrategy, PgVectorStore, SQL_IDENTIFIER, type DistanceStrategy } from './pgvector.js';
import { QDRANT_DEFAULTS, QdrantVectorStore } from './qdrant.js';

export type VectorStoreName = 'qdrant' | 'pgvector' | 'chromadb';

const DEFAULT_CHROMA_URL = 'http://localhost:8000';
const DEFAULT_POOL_SIZE = 5;
const DEFAULT_STATEMENT_TIMEOUT_MS = 10_000;

function providerCategory(context: ProviderBuildContext): string {
  return `${context.category}.${context.provider}`;
}

function readDistance(config: ResolvedConfig, category: string): DistanceStrategy {
  const distance = getString(config, 'distance') ?? 'cosine';
  if (!isDistanceStrategy(distance)) {
    throw new ConfigurationError(`Unsupported distance "${distance}" for "${category}"`, category);
  }
  return distance;
}

async function buildPgVector(config: ResolvedConfig, context: ProviderBuildContext): Promise<VectorStore> {
  const category = providerCategory(context);
  requireKeys(category, config, ['connectionString', 'collection']);
  const table = getString(config, 'collection') ?? '';
  if (!SQL_IDENTIFIER.test(table)) {
    throw new ConfigurationError(`Invalid collection name "${table}" for "${category}"`, category);
  }
  const distance = readDistance(config, category);

  const pool = new pg.Pool({
    connectionString: getString(config, 'connectionString'),
    max: getNumber(config, 'poolSize') ?? DEFAULT_POOL_SIZE,
    statement_timeout: getNumber(config, 'statementTimeoutMs') ?? DEFAULT_STATEMENT_TIMEOUT_MS,
  });
  // Idle clients dropped by the server surface here; the pool replaces them.
  pool.on('error', (err) => {
    context.logger.warn(`Idle PostgreSQL client of "${category}" failed: ${err.message}`);
  });
  try {
    const client = await pool.connect();
    client.release();
  } catch (err) {
    await pool.end();
    throw err;
  }
  return new PgVectorStore(pool, table, distance);
}

export const VECTOR_STORE_BUILDERS: Readonly<Record<VectorStoreName, ProviderBuilder<VectorStore>>> = {
  qdrant: (config, context) => {
    requireKeys(providerCategory(context), config, ['url', 'collection']);
    const apiKey = getString(config, 'apiKey');
    const client = new HttpClient({
      baseUrl: getString(config, 'url') ?? '',
      headers: apiKey ? { 'api-key': apiKey } : {},
    });
    return new QdrantVectorStore(client, {
      collection: getString(config, 'collection') ?? '',
      contentKey: getString(config, 'contentKey') ?? QDRANT_DEFAULTS.contentKey,
      metadataKey: getString(config, 'metadataKey') ?? QDRANT_DEFAULTS.metadataKey,
      scoreThreshold: getNumber(config, 'scoreThreshold'),
    });
  },
  pgvector: buildPgVector,
  chromadb: async (config, context) => {
    requireKeys(providerCategory(context), config, ['collection']);
    const client = new HttpClient({ baseUrl: getString(config, 'url') ?? DEFAULT_CHROMA_URL });
    const collectionId = await resolveChromaCollection(client, getString(config, 'collection') ?? '');
    return new ChromaVectorStore(client, collectionId);
  },
};

/** Factory over the `vector` category's `provider` discriminator. */
export function createVectorStoreFactory(
  config: ConfigProvider,
  logger: Logger,
): ProviderFactory<VectorStore, VectorStoreName> {
  return new ProviderFactory({ config, logger, variants: VECTOR_STORE_BUILDERS });
}
