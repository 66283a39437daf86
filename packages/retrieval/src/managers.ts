import type { ConfigCategory, ResolvedConfig } from '@toolgate/core';
import { BackendManager, type BackendManagerOptions, type ProviderFactory } from '@toolgate/connections';
import { createEmbeddingFactory, type EmbeddingProviderName } from './embedding/factory.js';
import { createVectorStoreFactory, type VectorStoreName } from './vector/factory.js';
import type { EmbeddingProvider, VectorStore } from './types.js';

export interface EmbeddingManagerOptions extends BackendManagerOptions {
  factory?: ProviderFactory<EmbeddingProvider, EmbeddingProviderName>;
}

/** The active embedding provider of the `embedding` category. */
export class EmbeddingManager extends BackendManager<EmbeddingProvider> {
  readonly kind = 'embedding';
  private readonly factory: ProviderFactory<EmbeddingProvider, EmbeddingProviderName>;

  constructor(options: EmbeddingManagerOptions) {
    super(options);
    this.factory = options.factory ?? createEmbeddingFactory(options.config, options.logger);
  }

  getConfigCategory(): ConfigCategory {
    return 'embedding';
  }

  protected connect(config: ResolvedConfig, category: ConfigCategory): Promise<EmbeddingProvider> {
    return this.factory.createFrom(category, config);
  }

  protected async disconnect(): Promise<void> {}
}

export interface VectorStoreManagerOptions extends BackendManagerOptions {
  factory?: ProviderFactory<VectorStore, VectorStoreName>;
}

/** The active vector store of the `vector` category. */
export class VectorStoreManager extends BackendManager<VectorStore> {
  readonly kind = 'vector store';
  private readonly factory: ProviderFactory<VectorStore, VectorStoreName>;

  constructor(options: VectorStoreManagerOptions) {
    super(options);
    this.factory = options.factory ?? createVectorStoreFactory(options.config, options.logger);
  }

  getConfigCategory(): ConfigCategory {
    return 'vector';
  }

  protected connect(config: ResolvedConfig, category: ConfigCategory): Promise<VectorStore> {
    return this.factory.createFrom(category, config);
  }

  protected async disconnect(store: VectorStore): Promise<void> {
    await store.close();
  }
}
