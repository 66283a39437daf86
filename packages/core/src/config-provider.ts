import type {
  ConfigCategory,
  ConfigMapping,
  ConfigProvider,
  ConfigValue,
  ResolvedConfig,
  SettingsTree,
} from './config.js';
import { isConfigMapping } from './config.js';
import { applyEnvOverrides, resolveEnvReferences, type EnvMap } from './config-env-overlay.js';
import { loadSettings } from './config-validator.js';
import { ConfigurationError } from './errors.js';
import type { Logger } from './logger.js';
import { toConfigMapping } from './utils.js';

/**
 * Find a category in a settings tree.
 * A literal key (`"external.datadog": {...}`) wins over the dotted path
 * (`external → datadog`).
 */
export function lookupCategory(tree: SettingsTree, category: ConfigCategory): ConfigValue | undefined {
  if (Object.hasOwn(tree, category)) {
    return tree[category];
  }

  let current: ConfigValue | undefined = tree;
  for (const segment of category.split('.')) {
    if (!isConfigMapping(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function isBlank(value: ConfigValue | undefined): boolean {
  return value === undefined || value === null || value === '';
}

/** Keys from `keys` that are absent, null, or empty in `config`. */
export function findMissingKeys(config: ResolvedConfig, keys: readonly string[]): string[] {
  return keys.filter((key) => isBlank(config[key]));
}

/** Throw ConfigurationError naming every key of `keys` missing from `config`. */
export function requireKeys(
  category: ConfigCategory,
  config: ResolvedConfig,
  keys: readonly string[],
): void {
  const missing = findMissingKeys(config, keys);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required configuration for "${category}": ${missing.join(', ')}`,
      category,
      missing,
    );
  }
}

function extractCategory(tree: SettingsTree, category: ConfigCategory): ConfigMapping {
  const value = lookupCategory(tree, category);
  if (value === undefined) {
    throw new ConfigurationError(`Unknown configuration category: "${category}"`, category);
  }
  if (!isConfigMapping(value)) {
    throw new ConfigurationError(`Configuration category "${category}" must be an object`, category);
  }
  return value;
}

/**
 * Configuration from an in-memory mapping supplied by the caller.
 * Performs no I/O and never reads the process environment.
 */
export class StaticConfigProvider implements ConfigProvider {
  private readonly settings: SettingsTree;

  constructor(settings: Record<string, unknown>) {
    this.settings = toConfigMapping(settings);
  }

  resolve(category: ConfigCategory): ResolvedConfig {
    return extractCategory(this.settings, category);
  }

  has(category: ConfigCategory): boolean {
    return isConfigMapping(lookupCategory(this.settings, category));
  }
}

export interface LiveConfigProviderOptions {
  /** Settings file (JSON5 or YAML). Required for reload(). */
  path?: string;
  /** Pre-loaded settings document, used when no path is given. */
  settings?: SettingsTree;
  /** Defaults to `process.env`. */
  env?: EnvMap;
  logger?: Logger;
}

/**
 * Configuration from the running process: a settings document with
 * `TOOLGATE_*` environment overrides, and `*Env` credential references
 * resolved when a category is read. Resolved categories are cached until
 * `invalidate()` or `reload()`.
 */
export class LiveConfigProvider implements ConfigProvider {
  private source: SettingsTree;
  private settings: SettingsTree;
  private readonly cache = new Map<ConfigCategory, ResolvedConfig>();
  private readonly env: EnvMap;
  private readonly path?: string;
  private readonly logger?: Logger;

  constructor(options: LiveConfigProviderOptions) {
    this.env = options.env ?? process.env;
    this.path = options.path;
    this.logger = options.logger;
    this.source = this.path ? readSettingsFile(this.path) : (options.settings ?? {});
    this.settings = applyEnvOverrides(this.source, this.env);
  }

  resolve(category: ConfigCategory): ResolvedConfig {
    const cached = this.cache.get(category);
    if (cached) return cached;

    const resolved = toConfigMapping(
      resolveEnvReferences(extractCategory(this.settings, category), this.env),
      category,
    );
    this.cache.set(category, resolved);
    return resolved;
  }

  has(category: ConfigCategory): boolean {
    return isConfigMapping(lookupCategory(this.settings, category));
  }

  /** Drop one cached category, or all of them. */
  invalidate(category?: ConfigCategory): void {
    if (category === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(category);
    }
  }

  /**
   * A separate provider over the same file and environment, read now. This
   * provider and its cache are left untouched.
   */
  fork(): LiveConfigProvider {
    const next = new LiveConfigProvider({
      path: this.path,
      settings: this.path ? undefined : this.source,
      env: this.env,
      logger: this.logger,
    });
    this.logger?.info(`Settings re-read${this.path ? ` from ${this.path}` : ''}`);
    return next;
  }

  /**
   * Re-read the settings file (when there is one) and the environment, then
   * drop every cached category. On an invalid file the previous settings stay
   * active and the error is thrown.
   */
  reload(): void {
    if (this.path) {
      this.source = readSettingsFile(this.path);
    }
    this.settings = applyEnvOverrides(this.source, this.env);
    this.cache.clear();
    this.logger?.info(`Settings reloaded${this.path ? ` from ${this.path}` : ''}`);
  }
}

function readSettingsFile(path: string): SettingsTree {
  const result = loadSettings(path);
  if (!result.valid || !result.settings) {
    const errorMessages = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid settings: ${errorMessages}`);
  }
  return result.settings;
}
