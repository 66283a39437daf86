import type {
  ConfigCategory,
  ConfigProvider,
  GuardrailPolicy,
  InvocationOptions,
  Logger,
  ResolvedConfig,
  ToolCatalogEntry,
  ToolDefinition,
  ToolInvocationResult,
  ToolSpec,
} from '@toolgate/core';
import { ConfigurationError, getBoolean, getMapping, isConfigMapping } from '@toolgate/core';
import { DuplicateToolNameError, ToolNotFoundError } from './errors.js';
import type { CircuitState } from './circuit-breaker.js';
import { failed, toErrorPayload, type ToolInvoker } from './guarded-tool.js';
import { createGuardrailPolicy, readPolicyOverrides } from './guardrails.js';
import type { ResultCache } from './result-cache.js';

const TOOL_NAME = /^[a-zA-Z0-9_-]{1,64}$/;

/** Handed to a descriptor's createTool() on first use. */
export interface ToolProviderContext {
  config: ConfigProvider;
  logger: Logger;
  /** Effective policy of each enabled tool of the descriptor. */
  policies: ReadonlyMap<string, GuardrailPolicy>;
  resultCache?: ResultCache;
}

/** One integration as seen by the registry. */
export interface ToolProviderDescriptor {
  category: ConfigCategory;
  definitions: readonly ToolSpec[];
  defaultPolicy?: Partial<GuardrailPolicy>;
  createTool(context: ToolProviderContext): ToolInvoker | Promise<ToolInvoker>;
}

export interface ToolRegistryOptions {
  config: ConfigProvider;
  logger: Logger;
  resultCache?: ResultCache;
}

interface ProviderSlot {
  descriptor: ToolProviderDescriptor;
  policies: ReadonlyMap<string, GuardrailPolicy>;
  instance?: Promise<ToolInvoker>;
  /** The settled instance, once construction succeeded. */
  created?: ToolInvoker;
}

interface RegistryEntry {
  definition: ToolDefinition;
  slot: ProviderSlot;
}

/** `false` or `{ enabled: false }` under `<category>.tools.<name>` turns one tool off. */
function readToolOverride(categoryConfig: ResolvedConfig, name: string): ResolvedConfig | false | undefined {
  const value = getMapping(categoryConfig, 'tools')?.[name];
  if (value === false) return false;
  if (!isConfigMapping(value)) return undefined;
  return getBoolean(value, 'enabled') === false ? false : value;
}

/**
 * Immutable catalog of enabled tools.
 *
 * Built once from provider descriptors: names are checked for uniqueness
 * across every declared tool, enablement and guardrail policies are resolved
 * from configuration, and disabled tools are left out entirely. Each
 * descriptor's tool instance is created on the first invocation of any of
 * its tools. Re-reading configuration requires a rebuild.
 */
export class ToolRegistry {
  private readonly entries: ReadonlyMap<string, RegistryEntry>;
  private readonly disabled: readonly string[];
  private readonly logger: Logger;
  private readonly config: ConfigProvider;
  private readonly resultCache?: ResultCache;

  private constructor(
    entries: Map<string, RegistryEntry>,
    disabled: string[],
    options: ToolRegistryOptions,
  ) {
    this.entries = entries;
    this.disabled = Object.freeze(disabled);
    this.logger = options.logger;
    this.config = options.config;
    this.resultCache = options.resultCache;
  }

  /** Build a registry. Throws DuplicateToolNameError or ConfigurationError. */
  static build(descriptors: readonly ToolProviderDescriptor[], options: ToolRegistryOptions): ToolRegistry {
    const owners = new Map<string, ConfigCategory>();
    for (const descriptor of descriptors) {
      for (const spec of descriptor.definitions) {
        if (!TOOL_NAME.test(spec.name)) {
          throw new ConfigurationError(
            `Invalid tool name "${spec.name}": use 1-64 letters, digits, "_" or "-"`,
            descriptor.category,
          );
        }
        const owner = owners.get(spec.name);
        if (owner !== undefined) {
          throw new DuplicateToolNameError(spec.name, owner, descriptor.category);
        }
        owners.set(spec.name, descriptor.category);
      }
    }

    const entries = new Map<string, RegistryEntry>();
    const disabled: string[] = [];

    for (const descriptor of descriptors) {
      const { category } = descriptor;
      const categoryConfig = options.config.has(category) ? options.config.resolve(category) : undefined;
      if (categoryConfig === undefined || getBoolean(categoryConfig, 'enabled') === false) {
        for (const spec of descriptor.definitions) disabled.push(spec.name);
        options.logger.debug(`Tools of "${category}" disabled by configuration`);
        continue;
      }

      const basePolicy = createGuardrailPolicy(
        readPolicyOverrides(categoryConfig),
        createGuardrailPolicy(descriptor.defaultPolicy ?? {}, undefined, `policy of "${category}"`),
        `policy of "${category}"`,
      );

      const policies = new Map<string, GuardrailPolicy>();
      const slot: ProviderSlot = { descriptor, policies };

      for (const spec of descriptor.definitions) {
        const override = readToolOverride(categoryConfig, spec.name);
        if (override === false) {
          disabled.push(spec.name);
          options.logger.debug(`Tool "${spec.name}" disabled by configuration`);
          continue;
        }

        const policy = createGuardrailPolicy(
          readPolicyOverrides(override),
          basePolicy,
          `policy of "${spec.name}"`,
        );
        policies.set(spec.name, policy);
        entries.set(spec.name, {
          definition: Object.freeze({ ...spec, category, enabled: true, policy }),
          slot,
        });
      }
    }

    options.logger.info(`Tool registry built: ${entries.size} enabled, ${disabled.length} disabled`);
    return new ToolRegistry(entries, disabled, options);
  }

  /** `{ name, description, inputSchema }` of every enabled tool, in declaration order. */
  getCatalog(): ToolCatalogEntry[] {
    return [...this.entries.values()].map(({ definition }) => ({
      name: definition.name,
      description: definition.description,
      inputSchema: definition.inputSchema,
    }));
  }

  getDefinitions(): ToolDefinition[] {
    return [...this.entries.values()].map((e) => e.definition);
  }

  /** Names declared by some provider but switched off in configuration. */
  getDisabledToolNames(): readonly string[] {
    return this.disabled;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** The definition of an enabled tool. Throws ToolNotFoundError otherwise. */
  resolve(name: string): ToolDefinition {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ToolNotFoundError(name);
    }
    return entry.definition;
  }

  /** Invoke a tool by name. Always resolves; failures come back as `failed` results. */
  async invoke(name: string, input: unknown, options: InvocationOptions = {}): Promise<ToolInvocationResult> {
    const entry = this.entries.get(name);
    if (!entry) {
      return failed(toErrorPayload(new ToolNotFoundError(name), name), 0);
    }

    const startedAt = Date.now();
    let tool: ToolInvoker;
    try {
      tool = await this.instantiate(entry.slot);
    } catch (err) {
      this.logger.error(
        `Failed to create tools for "${entry.definition.category}": ${err instanceof Error ? err.message : String(err)}`,
      );
      return failed(toErrorPayload(err, name), Date.now() - startedAt);
    }
    return tool.invoke(name, input, options);
  }

  /** Close every tool instance created so far. Failures are logged. */
  async close(): Promise<void> {
    const slots = new Set([...this.entries.values()].map((e) => e.slot));
    const closing = [...slots].map(async (slot) => {
      const instance = slot.instance;
      if (!instance) return;
      slot.instance = undefined;
      slot.created = undefined;
      const tool = await instance;
      await tool.close?.();
    });
    const results = await Promise.allSettled(closing);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn(
          `Failed to close tools: ${result.reason instanceof Error ? result.reason.message : String(result.reason)}`,
        );
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /** Circuit state of every category whose tools have been created. */
  getCircuitStates(): Record<ConfigCategory, CircuitState> {
    const states: Record<ConfigCategory, CircuitState> = {};
    for (const { slot } of this.entries.values()) {
      const state = slot.created?.circuitState?.();
      if (state !== undefined) states[slot.descriptor.category] = state;
    }
    return states;
  }

  // Memoized per descriptor; a failed construction is dropped so the next call retries.
  private instantiate(slot: ProviderSlot): Promise<ToolInvoker> {
    if (!slot.instance) {
      const created = Promise.resolve().then(() =>
        slot.descriptor.createTool({
          config: this.config,
          logger: this.logger,
          policies: slot.policies,
          resultCache: this.resultCache,
        }),
      );
      slot.instance = created;
      created.then(
        (tool) => {
          if (slot.instance === created) slot.created = tool;
        },
        () => {
          if (slot.instance === created) slot.instance = undefined;
        },
      );
    }
    return slot.instance;
  }
}
