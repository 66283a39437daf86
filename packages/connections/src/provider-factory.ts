import type { ConfigCategory, ConfigProvider, Logger, ResolvedConfig } from '@toolgate/core';
import { getString } from '@toolgate/core';
import { UnsupportedProviderError } from './errors.js';

const DEFAULT_DISCRIMINATOR = 'provider';

export interface ProviderBuildContext {
  /** The category whose discriminator selected this variant, e.g. `vector`. */
  category: ConfigCategory;
  /** The selected variant name, e.g. `qdrant`. */
  provider: string;
  logger: Logger;
}

export type ProviderBuilder<THandle> = (
  config: ResolvedConfig,
  context: ProviderBuildContext,
) => THandle | Promise<THandle>;

export interface ProviderFactoryOptions<THandle, TName extends string> {
  config: ConfigProvider;
  logger: Logger;
  /** Closed set of implementations keyed by discriminator value. */
  variants: Readonly<Record<TName, ProviderBuilder<THandle>>>;
  /** Key holding the discriminator. Defaults to `provider`. */
  discriminator?: string;
}

/**
 * Selects and builds the active implementation for a category.
 *
 * The category's `provider` value picks the variant; the variant receives
 * the configuration of `<category>.<provider>` when that sub-category exists,
 * otherwise the category's own mapping. An unknown or missing discriminator
 * throws UnsupportedProviderError. Nothing is cached here.
 */
export class ProviderFactory<THandle, TName extends string = string> {
  private readonly config: ConfigProvider;
  private readonly logger: Logger;
  private readonly builders: Readonly<Record<TName, ProviderBuilder<THandle>>>;
  private readonly discriminator: string;

  constructor(options: ProviderFactoryOptions<THandle, TName>) {
    this.config = options.config;
    this.logger = options.logger;
    this.builders = options.variants;
    this.discriminator = options.discriminator ?? DEFAULT_DISCRIMINATOR;
  }

  /** Supported discriminator values. */
  variants(): TName[] {
    return Object.keys(this.builders).filter((name): name is TName => this.isVariant(name));
  }

  /** Resolve the category and build its active implementation. */
  async create(category: ConfigCategory): Promise<THandle> {
    return this.createFrom(category, this.config.resolve(category));
  }

  /** Build from an already-resolved category mapping. */
  async createFrom(category: ConfigCategory, config: ResolvedConfig): Promise<THandle> {
    const provider = getString(config, this.discriminator);
    if (provider === undefined || !this.isVariant(provider)) {
      throw new UnsupportedProviderError(category, provider, this.variants());
    }

    const providerCategory = `${category}.${provider}`;
    const providerConfig = this.config.has(providerCategory)
      ? this.config.resolve(providerCategory)
      : config;

    this.logger.debug(`Creating "${provider}" implementation for "${category}"`);
    const builder = this.builders[provider];
    return builder(providerConfig, { category, provider, logger: this.logger });
  }

  private isVariant(name: string): name is TName {
    return Object.hasOwn(this.builders, name);
  }
}
