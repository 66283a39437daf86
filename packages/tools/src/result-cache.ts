import type { Redis } from 'ioredis';
import { isRecord } from '@toolgate/core';

/** A successful invocation outcome as stored in a result cache. */
export interface CachedResult {
  status: 'succeeded' | 'truncated';
  payload: unknown;
  droppedCount?: number;
}

/** Short-lived store for successful tool results, keyed per tool and arguments. */
export interface ResultCache {
  get(key: string): Promise<CachedResult | undefined>;
  set(key: string, value: CachedResult, ttlMs: number): Promise<void>;
  delete(key: string): Promise<void>;
}

/** Stable cache key for a tool call: object keys are sorted at every level. */
export function resultCacheKey(toolName: string, args: Record<string, unknown>): string {
  return `tool:${toolName}:${stableStringify(args)}`;
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function isCachedResult(value: unknown): value is CachedResult {
  return (
    isRecord(value) &&
    (value['status'] === 'succeeded' || value['status'] === 'truncated') &&
    'payload' in value &&
    (value['droppedCount'] === undefined || typeof value['droppedCount'] === 'number')
  );
}

// ── in-memory ──────────────────────────────────────────────────────────

interface MemoryEntry {
  value: CachedResult;
  expiresAt: number;
}

export interface InMemoryResultCacheOptions {
  /** Entries kept at most; the least recently used go first. Defaults to 1000. */
  maxEntries?: number;
  clock?: () => number;
}

export const DEFAULT_MAX_CACHE_ENTRIES = 1000;

/**
 * Process-local LRU cache. Expired entries are dropped when read, and all
 * of them are swept once the cache is full, before any live entry is evicted.
 */
export class InMemoryResultCache implements ResultCache {
  // Map order is recency order: oldest first.
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly maxEntries: number;
  private readonly clock: () => number;

  constructor(options: InMemoryResultCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_CACHE_ENTRIES);
    this.clock = options.clock ?? Date.now;
  }

  async get(key: string): Promise<CachedResult | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.clock() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: CachedResult, ttlMs: number): Promise<void> {
    const now = this.clock();
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: now + ttlMs });
    if (this.entries.size <= this.maxEntries) return;

    for (const [k, entry] of this.entries) {
      if (now >= entry.expiresAt) this.entries.delete(k);
    }
    for (const k of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(k);
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

// ── redis ──────────────────────────────────────────────────────────────

/** Shared cache backed by Redis; the client comes from a lazy manager. */
export class RedisResultCache implements ResultCache {
  constructor(private readonly getClient: () => Promise<Redis>) {}

  async get(key: string): Promise<CachedResult | undefined> {
    const client = await this.getClient();
    const raw = await client.get(key);
    if (raw === null) return undefined;
    const parsed: unknown = JSON.parse(raw);
    return isCachedResult(parsed) ? parsed : undefined;
  }

  async set(key: string, value: CachedResult, ttlMs: number): Promise<void> {
    const client = await this.getClient();
    await client.set(key, JSON.stringify(value), 'PX', ttlMs);
  }

  async delete(key: string): Promise<void> {
    const client = await this.getClient();
    await client.del(key);
  }
}
