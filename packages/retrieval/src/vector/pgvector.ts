import type { Pool } from 'pg';
import { isRecord } from '@toolgate/core';
import type { VectorMatch, VectorStore } from '../types.js';

export type DistanceStrategy = 'cosine' | 'euclidean' | 'inner_product';

export const DISTANCE_STRATEGIES: readonly DistanceStrategy[] = ['cosine', 'euclidean', 'inner_product'];

/** Plain SQL identifier; table names are interpolated, never bound. */
export const SQL_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]{0,62}$/;

const DISTANCE_SQL: Record<DistanceStrategy, { operator: string; score: (distance: string) => string }> = {
  cosine: { operator: '<=>', score: (d) => `1 - (${d})` },
  euclidean: { operator: '<->', score: (d) => `1 / (1 + (${d}))` },
  // <#> is the negated inner product
  inner_product: { operator: '<#>', score: (d) => `-(${d})` },
};

export function isDistanceStrategy(value: string): value is DistanceStrategy {
  return DISTANCE_STRATEGIES.some((s) => s === value);
}

type MatchRow = {
  id: string;
  content: string | null;
  metadata: unknown;
  score: number | string;
};

/** Build the similarity query for one collection table (`id`, `content`, `metadata`, `embedding`). */
export function buildSearchQuery(table: string, distance: DistanceStrategy): string {
  const { operator, score } = DISTANCE_SQL[distance];
  const expression = `embedding ${operator} $1::vector`;
  return (
    `SELECT id::text AS id, content, metadata, ${score(expression)} AS score ` +
    `FROM "${table}" ORDER BY ${expression} LIMIT $2`
  );
}

/**
 * Postgres table with a pgvector `embedding` column, queried through a pg
 * pool. pg queries take no AbortSignal; the pool's statement timeout bounds
 * them server side.
 */
export class PgVectorStore implements VectorStore {
  readonly id = 'pgvector';
  private readonly sql: string;

  constructor(
    private readonly pool: Pool,
    table: string,
    distance: DistanceStrategy,
  ) {
    this.sql = buildSearchQuery(table, distance);
  }

  async search(vector: readonly number[], limit: number): Promise<VectorMatch[]> {
    // pgvector parses the JSON array text form
    const result = await this.pool.query<MatchRow>(this.sql, [JSON.stringify(vector), limit]);
    return result.rows.map((row) => ({
      id: row.id,
      score: Number(row.score),
      content: row.content ?? '',
      metadata: isRecord(row.metadata) ? row.metadata : {},
    }));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
