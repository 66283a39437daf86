/** Dotted name of a logical configuration domain, e.g. `vector.qdrant` or `external.datadog`. */
export type ConfigCategory = string;

export type ConfigScalar = string | number | boolean | null;

export type ConfigValue = ConfigScalar | readonly ConfigValue[] | ConfigMapping;

export interface ConfigMapping {
  readonly [key: string]: ConfigValue;
}

/** Plain key/value configuration of one category, as handed to backend constructors. */
export type ResolvedConfig = ConfigMapping;

/** The hierarchical settings document (file + environment overlay, or a static mapping). */
export type SettingsTree = ConfigMapping;

/**
 * Source of per-category configuration.
 * Consumers depend only on this contract; the Live and Static variants are interchangeable.
 */
export interface ConfigProvider {
  /** Resolve a category. Throws ConfigurationError when the category is unknown. */
  resolve(category: ConfigCategory): ResolvedConfig;
  /** True when the category exists in the active settings. */
  has(category: ConfigCategory): boolean;
}

/** Top-level sections accepted in a settings document. */
export const SETTINGS_SECTIONS = [
  'database',
  'vector',
  'embedding',
  'cache',
  'external',
  'knowledge',
] as const;

export type SettingsSection = (typeof SETTINGS_SECTIONS)[number];

/**
 * Mixed-case keys read by the integrations. An environment override that
 * creates one of them (e.g. `..._APIKEY`) gets this spelling.
 */
export const KNOWN_SETTINGS_KEYS = [
  'apiKey',
  'apiToken',
  'appKey',
  'baseUrl',
  'batchSize',
  'cacheTtlSeconds',
  'circuitBreaker',
  'connectTimeoutMs',
  'connectionString',
  'contentKey',
  'cooldownMs',
  'defaultLimit',
  'failureThreshold',
  'failureWindowMs',
  'inputType',
  'keyPrefix',
  'maxEntries',
  'maxLimit',
  'metadataKey',
  'minScore',
  'poolSize',
  'scoreThreshold',
  'statementTimeoutMs',
  'successThreshold',
  'timeoutMs',
] as const;

// ── typed readers ──────────────────────────────────────────────────────

/** Type guard: a nested mapping (not an array, not null). */
export function isConfigMapping(value: ConfigValue | undefined): value is ConfigMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(config: ResolvedConfig, key: string): string | undefined {
  const value = config[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function getNumber(config: ResolvedConfig, key: string): number | undefined {
  const value = config[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function getBoolean(config: ResolvedConfig, key: string): boolean | undefined {
  const value = config[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function getMapping(config: ResolvedConfig, key: string): ConfigMapping | undefined {
  const value = config[key];
  return isConfigMapping(value) ? value : undefined;
}

export function getStringArray(config: ResolvedConfig, key: string): string[] | undefined {
  const value = config[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}
