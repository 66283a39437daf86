import { describe, it, expect, vi } from 'vitest';
import type { Logger, ToolInvocationResult } from '@toolgate/core';
import { StaticConfigProvider } from '@toolgate/core';
import type { ToolInvoker, ToolProviderDescriptor } from '@toolgate/tools';
import { bootstrap } from '../src/bootstrap.js';
import { formatCatalog, parseCommand, runCommand } from '../src/console.js';

function createLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('parseCommand', () => {
  it('recognises session commands', () => {
    expect(parseCommand('   ')).toEqual({ kind: 'empty' });
    expect(parseCommand('/quit')).toEqual({ kind: 'quit' });
    expect(parseCommand(' /tools ')).toEqual({ kind: 'tools' });
    expect(parseCommand('/reload')).toEqual({ kind: 'reload' });
    expect(parseCommand('/health')).toEqual({ kind: 'health' });
    expect(parseCommand('/help')).toEqual({ kind: 'invalid', message: 'Unknown command: /help' });
  });

  it('reads a tool name with JSON5 arguments', () => {
    expect(parseCommand("knowledge_search {query: 'restart pod', limit: 3}")).toEqual({
      kind: 'invoke',
      tool: 'knowledge_search',
      args: { query: 'restart pod', limit: 3 },
    });
  });

  it('defaults to empty arguments', () => {
    expect(parseCommand('jira_list_projects')).toEqual({ kind: 'invoke', tool: 'jira_list_projects', args: {} });
  });

  it('reports unparseable arguments', () => {
    const command = parseCommand('jira_get_issue {issue_key:');
    expect(command.kind).toBe('invalid');
    expect(command.kind === 'invalid' && command.message.startsWith('Arguments are not valid JSON5: ')).toBe(true);
  });
});

describe('runCommand', () => {
  async function createApp() {
    const invoker: ToolInvoker = {
      invoke: vi.fn(
        async (_name: string, input: unknown): Promise<ToolInvocationResult> => ({
          status: 'succeeded',
          payload: input,
          durationMs: 4,
        }),
      ),
      circuitState: () => 'CLOSED',
    };
    const descriptor: ToolProviderDescriptor = {
      category: 'external.fake',
      definitions: [
        { name: 'fake_search', description: 'Search fake things. Results are newest first.', inputSchema: { type: 'object' } },
        { name: 'fake_get', description: 'Get one fake thing', inputSchema: { type: 'object' } },
      ],
      createTool: () => invoker,
    };
    const app = await bootstrap({
      config: new StaticConfigProvider({ external: { fake: { enabled: true, tools: { fake_get: false } } } }),
      logger: createLogger(),
      descriptors: [descriptor],
    });
    return { app, invoker };
  }

  it('lists enabled tools with their first sentence and the disabled ones', async () => {
    const { app } = await createApp();

    expect(formatCatalog(app.registry)).toBe(
      ['1 tool(s) enabled:', '  fake_search: Search fake things.', 'Disabled: fake_get'].join('\n'),
    );
    expect(await runCommand(app, { kind: 'tools' })).toBe(formatCatalog(app.registry));
  });

  it('invokes a tool and renders the result', async () => {
    const { app, invoker } = await createApp();
    const controller = new AbortController();

    const output = await runCommand(app, parseCommand('fake_search {q: 1}'), controller.signal);

    expect(output).toBe('{\n  "q": 1\n}\n(succeeded in 4ms)');
    expect(invoker.invoke).toHaveBeenCalledWith('fake_search', { q: 1 }, { signal: controller.signal });
  });

  it('renders an unknown tool as a failure', async () => {
    const { app } = await createApp();

    expect(await runCommand(app, parseCommand('fake_get'))).toBe(
      'Error (ToolNotFoundError): Tool not found: fake_get\n(failed in 0ms)',
    );
  });

  it('reports circuit states once an integration has been used', async () => {
    const { app } = await createApp();
    expect(await runCommand(app, { kind: 'health' })).toBe('No integrations used yet.');

    await runCommand(app, parseCommand('fake_search {}'));
    expect(await runCommand(app, { kind: 'health' })).toBe('  external.fake: CLOSED');
  });

  it('signals quit with undefined', async () => {
    const { app } = await createApp();
    expect(await runCommand(app, { kind: 'quit' })).toBeUndefined();
  });
});
