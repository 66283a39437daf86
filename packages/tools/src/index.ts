// Registry
export { ToolRegistry } from './registry.js';
export type { ToolProviderDescriptor, ToolProviderContext, ToolRegistryOptions } from './registry.js';

// Guarded tools
export {
  GuardedTool,
  listOutput,
  valueOutput,
  descendingBy,
  runBounded,
  toErrorPayload,
  CACHE_TIMEOUT_MS,
} from './guarded-tool.js';
export type {
  GuardedToolOptions,
  OperationContext,
  OperationOutput,
  ToolInvoker,
  ToolOperation,
} from './guarded-tool.js';
export { CircuitBreaker, readBreakerOptions, DEFAULT_BREAKER_OPTIONS } from './circuit-breaker.js';
export type { CircuitBreakerOptions, CircuitState } from './circuit-breaker.js';
export { createGuardrailPolicy, readPolicyOverrides, clampLimit, DEFAULT_POLICY } from './guardrails.js';
export { formatInvocationResult } from './format.js';
export { redactSecrets } from './redact.js';
export { validateToolArgs, formatValidationErrors } from './schema-validator.js';
export type { ArgumentError, ArgumentValidationResult } from './schema-validator.js';

// Result caches
export { InMemoryResultCache, RedisResultCache, resultCacheKey, DEFAULT_MAX_CACHE_ENTRIES } from './result-cache.js';
export type { CachedResult, ResultCache, InMemoryResultCacheOptions } from './result-cache.js';

// Errors
export {
  DuplicateToolNameError,
  ToolNotFoundError,
  ToolValidationError,
  UpstreamError,
  UpstreamTimeoutError,
  CancelledError,
  CircuitOpenError,
} from './errors.js';

// Integrations
export * from './integrations/index.js';
