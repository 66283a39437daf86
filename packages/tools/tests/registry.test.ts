import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger, ToolInvocationResult, ToolSpec } from '@toolgate/core';
import { ConfigurationError, StaticConfigProvider } from '@toolgate/core';
import { ToolRegistry, type ToolProviderContext, type ToolProviderDescriptor } from '../src/registry.js';
import { DuplicateToolNameError, ToolNotFoundError } from '../src/errors.js';
import type { ToolInvoker } from '../src/guarded-tool.js';

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Helper to create a minimal tool spec. */
function makeSpec(name: string): ToolSpec {
  return { name, description: `Tool ${name}`, inputSchema: { type: 'object' }, limitParam: 'limit' };
}

function makeInvoker(): ToolInvoker {
  return {
    invoke: vi.fn(
      async (name: string): Promise<ToolInvocationResult> => ({ status: 'succeeded', payload: name, durationMs: 1 }),
    ),
    close: vi.fn(async () => {}),
  };
}

function makeDescriptor(category: string, names: string[], invoker: ToolInvoker = makeInvoker()) {
  const createTool = vi.fn((_context: ToolProviderContext) => invoker);
  const descriptor: ToolProviderDescriptor = {
    category,
    definitions: names.map(makeSpec),
    defaultPolicy: { defaultLimit: 50, maxLimit: 200, timeoutMs: 5000 },
    createTool,
  };
  return { descriptor, createTool, invoker };
}

const SETTINGS = {
  external: {
    datadog: { enabled: true, maxLimit: 300, tools: { logs_search: { maxLimit: 100, timeoutMs: 2000 } } },
    jira: { enabled: true, tools: { jira_get: false, jira_projects: { enabled: false } } },
    github: { enabled: false },
  },
};

describe('ToolRegistry', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createLogger();
  });

  function build(descriptors: ToolProviderDescriptor[], settings: Record<string, unknown> = SETTINGS) {
    return ToolRegistry.build(descriptors, { config: new StaticConfigProvider(settings), logger });
  }

  // ── enablement ─────────────────────────────────────────────────

  describe('enablement', () => {
    it('includes the tools of enabled categories', () => {
      const datadog = makeDescriptor('external.datadog', ['logs_search', 'metrics_query']);
      const registry = build([datadog.descriptor]);

      expect(registry.getCatalog().map((t) => t.name)).toEqual(['logs_search', 'metrics_query']);
      expect(registry.size).toBe(2);
      expect(logger.info).toHaveBeenCalledWith('Tool registry built: 2 enabled, 0 disabled');
    });

    it('excludes every tool of a disabled category', () => {
      const github = makeDescriptor('external.github', ['gh_search']);
      const registry = build([github.descriptor]);

      expect(registry.getCatalog()).toEqual([]);
      expect(registry.has('gh_search')).toBe(false);
      expect(registry.getDisabledToolNames()).toEqual(['gh_search']);
    });

    it('treats a category absent from configuration as disabled', () => {
      const slack = makeDescriptor('external.slack', ['slack_search']);
      expect(build([slack.descriptor]).size).toBe(0);
    });

    it('honours per-tool switches in both forms', () => {
      const jira = makeDescriptor('external.jira', ['jira_search', 'jira_get', 'jira_projects']);
      const registry = build([jira.descriptor]);

      expect(registry.getCatalog().map((t) => t.name)).toEqual(['jira_search']);
      expect(registry.getDisabledToolNames()).toEqual(['jira_get', 'jira_projects']);
    });

    it('reports disabled tools as not found', async () => {
      const github = makeDescriptor('external.github', ['gh_search']);
      const registry = build([github.descriptor]);

      expect(() => registry.resolve('gh_search')).toThrow(ToolNotFoundError);
      const result = await registry.invoke('gh_search', {});
      expect(result).toEqual({
        status: 'failed',
        payload: null,
        error: { kind: 'ToolNotFoundError', message: 'Tool not found: gh_search' },
        durationMs: 0,
      });
      expect(github.createTool).not.toHaveBeenCalled();
    });
  });

  // ── name integrity ─────────────────────────────────────────────

  describe('name integrity', () => {
    it('fails the build when two providers declare the same name', () => {
      const a = makeDescriptor('external.datadog', ['search']);
      const b = makeDescriptor('external.jira', ['search']);

      expect(() => build([a.descriptor, b.descriptor])).toThrow(DuplicateToolNameError);
      expect(() => build([a.descriptor, b.descriptor])).toThrow(
        'Duplicate tool name "search" declared by "external.datadog" and "external.jira"',
      );
      expect(a.createTool).not.toHaveBeenCalled();
    });

    it('detects duplicates even when one side is disabled', () => {
      const a = makeDescriptor('external.datadog', ['search']);
      const b = makeDescriptor('external.github', ['search']);
      expect(() => build([a.descriptor, b.descriptor])).toThrow(DuplicateToolNameError);
    });

    it('rejects names outside the allowed alphabet', () => {
      const bad = makeDescriptor('external.datadog', ['logs search']);
      expect(() => build([bad.descriptor])).toThrow(ConfigurationError);
    });
  });

  // ── policies ───────────────────────────────────────────────────

  describe('policies', () => {
    it('layers descriptor defaults, category keys and per-tool overrides', () => {
      const datadog = makeDescriptor('external.datadog', ['logs_search', 'metrics_query']);
      const registry = build([datadog.descriptor]);

      expect(registry.resolve('metrics_query').policy).toEqual({ defaultLimit: 50, maxLimit: 300, timeoutMs: 5000 });
      expect(registry.resolve('logs_search').policy).toEqual({ defaultLimit: 50, maxLimit: 100, timeoutMs: 2000 });
    });

    it('fails the build on an inconsistent policy', () => {
      const datadog = makeDescriptor('external.datadog', ['logs_search']);
      expect(() => build([datadog.descriptor], { external: { datadog: { defaultLimit: 500 } } })).toThrow(
        'Invalid guardrail policy of "external.datadog": defaultLimit (500) exceeds maxLimit (200)',
      );
    });

    it('produces identical catalogs and bounds when rebuilt from the same configuration', () => {
      const descriptors = () => [
        makeDescriptor('external.datadog', ['logs_search', 'metrics_query']).descriptor,
        makeDescriptor('external.jira', ['jira_search', 'jira_get']).descriptor,
      ];
      const first = build(descriptors());
      const second = build(descriptors());

      expect(second.getCatalog()).toEqual(first.getCatalog());
      expect(second.getDefinitions().map((d) => [d.name, d.policy])).toEqual(
        first.getDefinitions().map((d) => [d.name, d.policy]),
      );
    });

    it('exposes full definitions with category and enablement', () => {
      const datadog = makeDescriptor('external.datadog', ['metrics_query']);
      expect(build([datadog.descriptor]).resolve('metrics_query')).toMatchObject({
        name: 'metrics_query',
        category: 'external.datadog',
        enabled: true,
      });
    });
  });

  // ── lazy construction ──────────────────────────────────────────

  describe('lazy construction', () => {
    it('creates nothing at build time', () => {
      const datadog = makeDescriptor('external.datadog', ['logs_search']);
      build([datadog.descriptor]);
      expect(datadog.createTool).not.toHaveBeenCalled();
    });

    it('creates the tool once per descriptor, even under concurrent first invocations', async () => {
      const datadog = makeDescriptor('external.datadog', ['logs_search', 'metrics_query']);
      const registry = build([datadog.descriptor]);

      const results = await Promise.all([
        registry.invoke('logs_search', { limit: 5 }),
        registry.invoke('metrics_query', {}),
        registry.invoke('logs_search', {}),
      ]);

      expect(datadog.createTool).toHaveBeenCalledTimes(1);
      expect(results.map((r) => r.payload)).toEqual(['logs_search', 'metrics_query', 'logs_search']);
      expect(datadog.invoker.invoke).toHaveBeenCalledWith('logs_search', { limit: 5 }, {});
    });

    it('hands createTool the effective policies of its enabled tools', async () => {
      const jira = makeDescriptor('external.jira', ['jira_search', 'jira_get']);
      const registry = build([jira.descriptor]);

      await registry.invoke('jira_search', {});

      const context = jira.createTool.mock.calls[0]?.[0];
      expect([...(context?.policies.keys() ?? [])]).toEqual(['jira_search']);
    });

    it('does not memoize a failed construction', async () => {
      const datadog = makeDescriptor('external.datadog', ['logs_search']);
      datadog.createTool.mockImplementationOnce(() => {
        throw new ConfigurationError('Missing required configuration', 'external.datadog', ['apiKey']);
      });
      const registry = build([datadog.descriptor]);

      const first = await registry.invoke('logs_search', {});
      const second = await registry.invoke('logs_search', {});

      expect(first.status === 'failed' && first.error).toEqual({
        kind: 'ConfigurationError',
        message: 'Tool "logs_search" is not configured: missing apiKey',
      });
      expect(second.status).toBe('succeeded');
      expect(datadog.createTool).toHaveBeenCalledTimes(2);
    });

    it('reports circuit states of created tools only', async () => {
      const datadog = makeDescriptor('external.datadog', ['logs_search']);
      datadog.invoker.circuitState = () => 'OPEN';
      const jira = makeDescriptor('external.jira', ['jira_search']);
      const registry = build([datadog.descriptor, jira.descriptor]);
      expect(registry.getCircuitStates()).toEqual({});

      await registry.invoke('logs_search', {});

      expect(registry.getCircuitStates()).toEqual({ 'external.datadog': 'OPEN' });
    });

    it('closes created tools', async () => {
      const datadog = makeDescriptor('external.datadog', ['logs_search']);
      const jira = makeDescriptor('external.jira', ['jira_search']);
      const registry = build([datadog.descriptor, jira.descriptor]);
      await registry.invoke('logs_search', {});

      await registry.close();

      expect(datadog.invoker.close).toHaveBeenCalledTimes(1);
      expect(jira.invoker.close).not.toHaveBeenCalled();
    });
  });
});
