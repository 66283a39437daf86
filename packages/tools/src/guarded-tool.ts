import type {
  ConfigCategory,
  ConfigProvider,
  GuardrailPolicy,
  InvocationOptions,
  Logger,
  ResolvedConfig,
  ToolInvocationError,
  ToolInvocationResult,
  ToolSpec,
} from '@toolgate/core';
import { ConfigurationError, findMissingKeys, getNumber, isRecord } from '@toolgate/core';
import { ConnectionError, HttpStatusError } from '@toolgate/connections';
import { CircuitBreaker, readBreakerOptions, type CircuitState } from './circuit-breaker.js';
import {
  CancelledError,
  CircuitOpenError,
  ToolNotFoundError,
  ToolValidationError,
  UpstreamError,
  UpstreamTimeoutError,
} from './errors.js';
import { clampLimit, DEFAULT_POLICY } from './guardrails.js';
import { redactSecrets } from './redact.js';
import { resultCacheKey, type CachedResult, type ResultCache } from './result-cache.js';
import { formatValidationErrors, validateToolArgs } from './schema-validator.js';

/** Upper bound on one result cache read or write. */
export const CACHE_TIMEOUT_MS = 250;

/** What an operation returns: one value, or a list the wrapper may truncate. */
export type OperationOutput =
  | { readonly kind: 'value'; readonly value: unknown }
  | {
      readonly kind: 'list';
      /** Items in the operation's stable order (e.g. most recent first). */
      ordered(): readonly unknown[];
    };

export function valueOutput(value: unknown): OperationOutput {
  return { kind: 'value', value };
}

/**
 * Wrap a list result. `compare` gives the order kept when the list is cut
 * down to the effective limit; items that compare equal keep their
 * upstream order.
 */
export function listOutput<T>(items: readonly T[], compare?: (a: T, b: T) => number): OperationOutput {
  return {
    kind: 'list',
    ordered: () => (compare ? [...items].sort(compare) : items),
  };
}

/** Comparator putting larger keys first; missing keys sort last. */
export function descendingBy<T>(key: (item: T) => string | number | undefined): (a: T, b: T) => number {
  return (a, b) => {
    const ka = key(a);
    const kb = key(b);
    if (ka === kb) return 0;
    if (ka === undefined) return 1;
    if (kb === undefined) return -1;
    return ka < kb ? 1 : -1;
  };
}

export interface OperationContext<THandle> {
  handle: THandle;
  /** Validated arguments. */
  args: Record<string, unknown>;
  /** Effective limit after clamping (defaultLimit when the tool has no limit parameter). */
  limit: number;
  /** Fires on timeout or caller cancellation. */
  signal: AbortSignal;
  config: ResolvedConfig;
}

export interface ToolOperation<THandle> {
  spec: ToolSpec;
  /** Category keys checked before any backend is built. */
  requiredKeys?: readonly string[];
  /** Whether successful results may be served from the result cache. */
  cacheable?: boolean;
  run(context: OperationContext<THandle>): Promise<OperationOutput>;
}

/** Anything the registry can dispatch an invocation to. */
export interface ToolInvoker {
  invoke(toolName: string, input: unknown, options?: InvocationOptions): Promise<ToolInvocationResult>;
  close?(): Promise<void>;
  /** State of the circuit in front of the tool's service, where there is one. */
  circuitState?(): CircuitState;
}

export interface GuardedToolOptions<THandle> {
  category: ConfigCategory;
  config: ConfigProvider;
  logger: Logger;
  operations: readonly ToolOperation<THandle>[];
  /** Obtain the backend handle; normally a manager's getClient(). */
  connect: () => Promise<THandle>;
  /** Release whatever `connect` built. */
  close?: () => Promise<void>;
  /** Effective policy per tool name; tools absent here use DEFAULT_POLICY. */
  policies?: ReadonlyMap<string, GuardrailPolicy>;
  resultCache?: ResultCache;
  /**
   * Circuit in front of the backend. Defaults to one built from the
   * category's `circuitBreaker` keys; `false` turns it off.
   */
  circuitBreaker?: CircuitBreaker | false;
}

/**
 * Guardrail envelope around one integration's operations.
 *
 * Every invocation resolves to a ToolInvocationResult: arguments are
 * validated, required configuration is checked before any backend is built,
 * the limit is clamped, the call runs under the policy timeout and the
 * caller's signal, and oversized lists are truncated. Errors never escape.
 * Result cache reads and writes are bounded by CACHE_TIMEOUT_MS and the
 * caller's signal; a slow cache counts as a miss. While the circuit is
 * open, calls fail fast without touching the backend.
 */
export class GuardedTool<THandle> implements ToolInvoker {
  readonly category: ConfigCategory;
  private readonly config: ConfigProvider;
  private readonly logger: Logger;
  private readonly operations = new Map<string, ToolOperation<THandle>>();
  private readonly connect: () => Promise<THandle>;
  private readonly closeBackend?: () => Promise<void>;
  private readonly policies: ReadonlyMap<string, GuardrailPolicy>;
  private readonly resultCache?: ResultCache;
  private readonly breaker?: CircuitBreaker;

  constructor(options: GuardedToolOptions<THandle>) {
    this.category = options.category;
    this.config = options.config;
    this.logger = options.logger;
    this.connect = options.connect;
    this.closeBackend = options.close;
    this.policies = options.policies ?? new Map();
    this.resultCache = options.resultCache;
    for (const operation of options.operations) {
      this.operations.set(operation.spec.name, operation);
    }
    this.breaker = options.circuitBreaker === false ? undefined : (options.circuitBreaker ?? this.createBreaker());
  }

  circuitState(): CircuitState {
    return this.breaker?.getState() ?? 'CLOSED';
  }

  /** Names of the wrapped operations. */
  get toolNames(): string[] {
    return [...this.operations.keys()];
  }

  policyFor(toolName: string): GuardrailPolicy {
    return this.policies.get(toolName) ?? DEFAULT_POLICY;
  }

  async invoke(
    toolName: string,
    input: unknown,
    options: InvocationOptions = {},
  ): Promise<ToolInvocationResult> {
    const startedAt = Date.now();
    const elapsed = () => Date.now() - startedAt;

    const operation = this.operations.get(toolName);
    if (!operation) {
      return failed(toErrorPayload(new ToolNotFoundError(toolName), toolName), elapsed());
    }

    let config: ResolvedConfig | undefined;
    try {
      const args = validateArgs(operation.spec, input);
      config = this.config.resolve(this.category);
      const missing = findMissingKeys(config, operation.requiredKeys ?? []);
      if (missing.length > 0) {
        throw new ConfigurationError(
          `Missing required configuration for "${this.category}": ${missing.join(', ')}`,
          this.category,
          missing,
        );
      }

      const policy = this.policyFor(toolName);
      const limit = clampLimit(policy, operation.spec.limitParam ? args[operation.spec.limitParam] : undefined);
      const effectiveArgs = operation.spec.limitParam ? { ...args, [operation.spec.limitParam]: limit } : args;

      const cacheKey = resultCacheKey(toolName, effectiveArgs);
      const ttlMs = this.cacheTtlMs(operation, config);
      const hit = ttlMs > 0 ? await this.readCache(cacheKey, policy.timeoutMs, options.signal) : undefined;
      if (hit) {
        this.logger.debug(`Tool "${toolName}" served from cache`);
        return fromCached(hit, elapsed());
      }

      if (this.breaker && !this.breaker.isAllowed()) {
        throw new CircuitOpenError(this.category, this.breaker.retryAfterMs());
      }

      const resolvedConfig = config;
      let output: OperationOutput;
      try {
        output = await runBounded(
          async (signal) =>
            operation.run({
              handle: await this.connect(),
              args: effectiveArgs,
              limit,
              signal,
              config: resolvedConfig,
            }),
          policy.timeoutMs,
          options.signal,
          Math.max(0, policy.timeoutMs - elapsed()),
        );
      } catch (err) {
        if (countsAgainstCircuit(err)) this.breaker?.recordFailure();
        throw err;
      }
      this.breaker?.recordSuccess();

      const outcome = shape(output, limit);
      if (ttlMs > 0) {
        await this.writeCache(cacheKey, outcome, ttlMs, options.signal);
      }
      return fromCached(outcome, elapsed());
    } catch (err) {
      const error = toErrorPayload(err, toolName);
      if (error.kind !== 'ValidationError' && error.kind !== 'CancelledError') {
        const detail = err instanceof Error ? err.message : String(err);
        this.logger.warn(
          `Tool "${toolName}" failed [${this.category}] ${error.kind}: ${redactSecrets(detail, config)}`,
        );
      }
      return failed(error, elapsed());
    }
  }

  async close(): Promise<void> {
    await this.closeBackend?.();
  }

  private cacheTtlMs(operation: ToolOperation<THandle>, config: ResolvedConfig): number {
    if (!this.resultCache || !operation.cacheable) return 0;
    const seconds = getNumber(config, 'cacheTtlSeconds') ?? 0;
    return seconds > 0 ? seconds * 1000 : 0;
  }

  private createBreaker(): CircuitBreaker | undefined {
    let config: ResolvedConfig | undefined;
    try {
      config = this.config.resolve(this.category);
    } catch (err) {
      // An unusable category fails each invocation instead; the breaker keeps its defaults.
      if (!(err instanceof ConfigurationError)) throw err;
    }
    const options = readBreakerOptions(config);
    if (!options) return undefined;
    return new CircuitBreaker({
      ...options,
      onStateChange: (state) => this.logger.warn(`Circuit for "${this.category}" is now ${state}`),
    });
  }

  // Cache trouble degrades to a live call; it never fails the invocation.
  private async readCache(
    key: string,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<CachedResult | undefined> {
    const cache = this.resultCache;
    if (!cache) return undefined;
    try {
      return await runBounded(() => cache.get(key), Math.min(CACHE_TIMEOUT_MS, timeoutMs), signal);
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      this.logger.warn(`Result cache read failed: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  }

  private async writeCache(
    key: string,
    value: CachedResult,
    ttlMs: number,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const cache = this.resultCache;
    if (!cache) return;
    try {
      await runBounded(() => cache.set(key, value, ttlMs), CACHE_TIMEOUT_MS, signal);
    } catch (err) {
      if (err instanceof CancelledError) return;
      this.logger.warn(`Result cache write failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

function validateArgs(spec: ToolSpec, input: unknown): Record<string, unknown> {
  const args = input ?? {};
  if (!isRecord(args)) {
    throw new ToolValidationError('Arguments must be a JSON object');
  }
  const result = validateToolArgs(args, spec.inputSchema);
  if (!result.valid) {
    throw new ToolValidationError(formatValidationErrors(result.errors, spec.inputSchema));
  }
  return args;
}

function shape(output: OperationOutput, limit: number): CachedResult {
  if (output.kind === 'value') {
    return { status: 'succeeded', payload: output.value };
  }
  const items = output.ordered();
  if (items.length <= limit) {
    return { status: 'succeeded', payload: items };
  }
  return {
    status: 'truncated',
    payload: items.slice(0, limit),
    droppedCount: items.length - limit,
  };
}

function fromCached(outcome: CachedResult, durationMs: number): ToolInvocationResult {
  if (outcome.status === 'truncated') {
    return {
      status: 'truncated',
      payload: outcome.payload,
      droppedCount: outcome.droppedCount ?? 0,
      durationMs,
    };
  }
  return { status: 'succeeded', payload: outcome.payload, durationMs };
}

export function failed(error: ToolInvocationError, durationMs: number): ToolInvocationResult {
  return { status: 'failed', payload: null, error, durationMs };
}

/** Failures that say something about the service's health. */
function countsAgainstCircuit(err: unknown): boolean {
  if (err instanceof HttpStatusError || err instanceof UpstreamError) {
    return err.status === undefined || err.status >= 500 || err.status === 429;
  }
  return !(
    err instanceof CancelledError ||
    err instanceof ConfigurationError ||
    err instanceof ToolValidationError
  );
}

/**
 * Run `task` under a timeout and the caller's signal. Settles as soon as
 * either fires, whether or not the task honours the signal it was given.
 * `budgetMs` is the time actually left; the timeout error still names
 * `timeoutMs`.
 */
export function runBounded<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  callerSignal?: AbortSignal,
  budgetMs: number = timeoutMs,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();

    const abort = (reason: Error) => {
      cleanup();
      controller.abort(reason);
      reject(reason);
    };
    const onCallerAbort = () => abort(new CancelledError());
    const timer = setTimeout(() => abort(new UpstreamTimeoutError(timeoutMs)), budgetMs);
    const cleanup = () => {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    };

    if (callerSignal?.aborted) {
      onCallerAbort();
      return;
    }
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

/** Map any thrown value to the caller-facing error. Messages carry no category names or credentials. */
export function toErrorPayload(err: unknown, toolName: string): ToolInvocationError {
  if (err instanceof ToolValidationError) {
    return { kind: 'ValidationError', message: err.message };
  }
  if (err instanceof ToolNotFoundError) {
    return { kind: 'ToolNotFoundError', message: err.message };
  }
  if (err instanceof ConfigurationError) {
    return {
      kind: 'ConfigurationError',
      message:
        err.missingKeys.length > 0
          ? `Tool "${toolName}" is not configured: missing ${err.missingKeys.join(', ')}`
          : `Tool "${toolName}" is not configured correctly`,
    };
  }
  if (err instanceof ConnectionError) {
    return { kind: 'ConnectionError', message: `Could not connect to the service behind "${toolName}"` };
  }
  if (err instanceof UpstreamTimeoutError) {
    return { kind: 'UpstreamTimeoutError', message: err.message };
  }
  if (err instanceof CancelledError) {
    return { kind: 'CancelledError', message: err.message };
  }
  if (err instanceof CircuitOpenError) {
    const seconds = Math.ceil(err.retryAfterMs / 1000);
    return {
      kind: 'UpstreamError',
      message: `The service behind "${toolName}" is temporarily unavailable; retry in ${seconds}s`,
    };
  }
  const status =
    err instanceof HttpStatusError || err instanceof UpstreamError ? err.status : undefined;
  return {
    kind: 'UpstreamError',
    message: `Upstream request failed${status === undefined ? '' : ` (HTTP ${status})`}`,
  };
}
