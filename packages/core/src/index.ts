// Configuration model
export type {
  ConfigCategory,
  ConfigScalar,
  ConfigValue,
  ConfigMapping,
  ResolvedConfig,
  SettingsTree,
  ConfigProvider,
  SettingsSection,
} from './config.js';
export {
  SETTINGS_SECTIONS,
  KNOWN_SETTINGS_KEYS,
  isConfigMapping,
  getString,
  getNumber,
  getBoolean,
  getMapping,
  getStringArray,
} from './config.js';

// Config providers
export {
  StaticConfigProvider,
  LiveConfigProvider,
  lookupCategory,
  findMissingKeys,
  requireKeys,
} from './config-provider.js';
export type { LiveConfigProviderOptions } from './config-provider.js';

// Settings loading
export { applyEnvOverrides, resolveEnvReferences } from './config-env-overlay.js';
export type { EnvMap } from './config-env-overlay.js';
export { validateSettings, loadSettings, detectFormat } from './config-validator.js';
export type {
  SettingsFormat,
  SettingsValidationError,
  SettingsValidationResult,
} from './config-validator.js';

// Tool definitions
export type {
  JSONSchema,
  GuardrailPolicy,
  ToolCatalogEntry,
  ToolSpec,
  ToolDefinition,
  ToolInvocationStatus,
  ToolErrorKind,
  ToolInvocationError,
  ToolInvocationResult,
  InvocationOptions,
} from './tools.js';

// Logging
export type { Logger } from './logger.js';
export { createConsoleLogger } from './logger.js';

// Errors
export { ConfigurationError } from './errors.js';

// Utilities
export { isRecord, toConfigValue, toConfigMapping } from './utils.js';
