import type { ConfigProvider, EnvMap, Logger } from '@toolgate/core';
import { ConfigurationError, getBoolean, getNumber, LiveConfigProvider } from '@toolgate/core';
import { ProviderFactory, RedisConnectionManager } from '@toolgate/connections';
import { knowledgeTools } from '@toolgate/retrieval';
import {
  InMemoryResultCache,
  RedisResultCache,
  ToolRegistry,
  confluenceTools,
  datadogTools,
  githubTools,
  jiraTools,
  type ResultCache,
  type ToolProviderDescriptor,
} from '@toolgate/tools';

export const RESULT_CACHE_CATEGORY = 'cache';

export type ResultCacheName = 'memory' | 'redis';

export interface BootstrapOptions {
  /** Settings file (JSON5 or YAML). Ignored when `config` is given. */
  configPath?: string;
  /** Use this provider instead of reading a settings file. */
  config?: ConfigProvider;
  /** Environment for overrides and `*Env` references. Defaults to `process.env`. */
  env?: EnvMap;
  logger: Logger;
  /** Tool providers to register. Defaults to the built-in integrations. */
  descriptors?: readonly ToolProviderDescriptor[];
}

export interface ToolgateApp {
  /** The provider behind the current registry; replaced by `reload()`. */
  readonly config: ConfigProvider;
  /** The registry serving invocations; replaced by `reload()`. */
  readonly registry: ToolRegistry;
  resultCache: ResultCache | undefined;
  /**
   * Re-read settings into a new provider and build a new registry on it.
   * Only when both succeed are they swapped in and the previous tools
   * closed; otherwise the current provider and registry stay as they were.
   * Result cache settings are read once, at bootstrap.
   */
  reload(): Promise<ToolRegistry>;
  shutdown(): Promise<void>;
}

export function defaultDescriptors(): ToolProviderDescriptor[] {
  return [datadogTools(), jiraTools(), confluenceTools(), githubTools(), knowledgeTools()];
}

async function createResultCache(
  config: ConfigProvider,
  logger: Logger,
  redis: RedisConnectionManager,
): Promise<ResultCache | undefined> {
  if (!config.has(RESULT_CACHE_CATEGORY)) return undefined;
  if (getBoolean(config.resolve(RESULT_CACHE_CATEGORY), 'enabled') === false) return undefined;

  const factory = new ProviderFactory<ResultCache, ResultCacheName>({
    config,
    logger,
    variants: {
      memory: (settings) => new InMemoryResultCache({ maxEntries: getNumber(settings, 'maxEntries') }),
      redis: () => new RedisResultCache(() => redis.getClient()),
    },
  });
  return factory.create(RESULT_CACHE_CATEGORY);
}

/**
 * Wire the application:
 * 1. Settings: the given provider, or a LiveConfigProvider over the settings file
 * 2. Optional result cache (`cache.provider`: memory or redis)
 * 3. Tool registry over every descriptor
 * 4. Return a handle for reload and shutdown
 */
export async function bootstrap(options: BootstrapOptions): Promise<ToolgateApp> {
  const { logger } = options;
  if (!options.config && !options.configPath) {
    throw new ConfigurationError('Either a settings file path or a config provider is required');
  }

  // 1. Settings
  let config: ConfigProvider =
    options.config ?? new LiveConfigProvider({ path: options.configPath, env: options.env, logger });

  // 2. Result cache
  const redis = new RedisConnectionManager({ config, logger });
  const resultCache = await createResultCache(config, logger, redis);

  // 3. Registry
  const descriptors = options.descriptors ?? defaultDescriptors();
  const build = (provider: ConfigProvider) =>
    ToolRegistry.build(descriptors, { config: provider, logger, resultCache });
  let registry = build(config);

  // 4. Lifecycle
  return {
    get config() {
      return config;
    },
    get registry() {
      return registry;
    },
    resultCache,
    async reload() {
      const nextConfig = config instanceof LiveConfigProvider ? config.fork() : config;
      const nextRegistry = build(nextConfig);
      const previous = registry;
      config = nextConfig;
      registry = nextRegistry;
      await previous.close();
      return registry;
    },
    async shutdown() {
      await registry.close();
      await redis.closeAll();
      logger.info('Shut down');
    },
  };
}
