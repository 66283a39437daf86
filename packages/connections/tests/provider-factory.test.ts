import { describe, it, expect, vi } from 'vitest';
import type { Logger, ResolvedConfig } from '@toolgate/core';
import { ConfigurationError, StaticConfigProvider, getString } from '@toolgate/core';
import { ProviderFactory, UnsupportedProviderError } from '../src/index.js';

interface Store {
  kind: 'qdrant' | 'chromadb';
  url: string;
}

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createFactory(settings: Record<string, unknown>) {
  const qdrant = vi.fn((config: ResolvedConfig): Store => ({ kind: 'qdrant', url: getString(config, 'url') ?? '' }));
  const chromadb = vi.fn(async (config: ResolvedConfig): Promise<Store> => ({
    kind: 'chromadb',
    url: getString(config, 'url') ?? '',
  }));
  const logger = createLogger();
  const factory = new ProviderFactory<Store, 'qdrant' | 'chromadb'>({
    config: new StaticConfigProvider(settings),
    logger,
    variants: { qdrant, chromadb },
  });
  return { factory, qdrant, chromadb, logger };
}

describe('ProviderFactory', () => {
  it('lists the supported variants', () => {
    const { factory } = createFactory({});
    expect(factory.variants()).toEqual(['qdrant', 'chromadb']);
  });

  it('builds the variant named by the discriminator from its sub-category', async () => {
    const { factory, qdrant, chromadb, logger } = createFactory({
      vector: { provider: 'qdrant', qdrant: { url: 'http://localhost:6333' } },
    });

    const store = await factory.create('vector');

    expect(store).toEqual({ kind: 'qdrant', url: 'http://localhost:6333' });
    expect(qdrant).toHaveBeenCalledWith(
      { url: 'http://localhost:6333' },
      { category: 'vector', provider: 'qdrant', logger },
    );
    expect(chromadb).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith('Creating "qdrant" implementation for "vector"');
  });

  it('falls back to the category mapping when no sub-category exists', async () => {
    const { factory } = createFactory({
      vector: { provider: 'chromadb', url: 'http://localhost:8000' },
    });
    expect(await factory.create('vector')).toEqual({ kind: 'chromadb', url: 'http://localhost:8000' });
  });

  it('rejects an unknown discriminator, naming the valid ones', async () => {
    const { factory, qdrant } = createFactory({ vector: { provider: 'milvus' } });

    const err = await factory.create('vector').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UnsupportedProviderError);
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err instanceof UnsupportedProviderError && err.message).toBe(
      'Unsupported provider "milvus" for "vector". Valid providers are: qdrant, chromadb',
    );
    expect(err instanceof UnsupportedProviderError && err.provider).toBe('milvus');
    expect(qdrant).not.toHaveBeenCalled();
  });

  it('rejects a missing discriminator', async () => {
    const { factory } = createFactory({ vector: { url: 'http://localhost:6333' } });
    await expect(factory.create('vector')).rejects.toThrow(
      'No provider configured for "vector". Valid providers are: qdrant, chromadb',
    );
  });

  it('does not treat inherited object keys as variants', async () => {
    const { factory } = createFactory({ vector: { provider: 'toString' } });
    await expect(factory.create('vector')).rejects.toBeInstanceOf(UnsupportedProviderError);
  });

  it('honours a custom discriminator key', async () => {
    const qdrant = vi.fn((): Store => ({ kind: 'qdrant', url: 'x' }));
    const factory = new ProviderFactory<Store>({
      config: new StaticConfigProvider({ vector: { backend: 'qdrant' } }),
      logger: createLogger(),
      variants: { qdrant },
      discriminator: 'backend',
    });
    expect((await factory.create('vector')).kind).toBe('qdrant');
  });

  it('builds a fresh instance on every call', async () => {
    const { factory, qdrant } = createFactory({ vector: { provider: 'qdrant', url: 'u' } });
    const a = await factory.create('vector');
    const b = await factory.create('vector');
    expect(a).not.toBe(b);
    expect(qdrant).toHaveBeenCalledTimes(2);
  });
});
