import JSON5 from 'json5';
import { formatInvocationResult, type ToolRegistry } from '@toolgate/tools';
import type { ToolgateApp } from './bootstrap.js';

export type ConsoleCommand =
  | { kind: 'empty' }
  | { kind: 'quit' }
  | { kind: 'tools' }
  | { kind: 'reload' }
  | { kind: 'health' }
  | { kind: 'invoke'; tool: string; args: unknown }
  | { kind: 'invalid'; message: string };

/**
 * Parse one console line. Slash commands control the session; anything else
 * is `<tool name> [JSON5 arguments]`.
 */
export function parseCommand(line: string): ConsoleCommand {
  const input = line.trim();
  if (!input) return { kind: 'empty' };
  if (input === '/quit') return { kind: 'quit' };
  if (input === '/tools') return { kind: 'tools' };
  if (input === '/reload') return { kind: 'reload' };
  if (input === '/health') return { kind: 'health' };
  if (input.startsWith('/')) return { kind: 'invalid', message: `Unknown command: ${input}` };

  const space = input.search(/\s/);
  const tool = space === -1 ? input : input.slice(0, space);
  const rest = space === -1 ? '' : input.slice(space).trim();
  if (!rest) return { kind: 'invoke', tool, args: {} };

  try {
    const args: unknown = JSON5.parse(rest);
    return { kind: 'invoke', tool, args };
  } catch (err) {
    return {
      kind: 'invalid',
      message: `Arguments are not valid JSON5: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}

function firstSentence(text: string): string {
  const end = text.indexOf('. ');
  return end === -1 ? text : text.slice(0, end + 1);
}

export function formatCatalog(registry: ToolRegistry): string {
  const catalog = registry.getCatalog();
  const lines =
    catalog.length === 0
      ? ['No tools enabled.']
      : [`${catalog.length} tool(s) enabled:`, ...catalog.map((t) => `  ${t.name}: ${firstSentence(t.description)}`)];

  const disabled = registry.getDisabledToolNames();
  if (disabled.length > 0) {
    lines.push(`Disabled: ${disabled.join(', ')}`);
  }
  return lines.join('\n');
}

/** Circuit state of every integration used so far. */
export function formatHealth(registry: ToolRegistry): string {
  const states = Object.entries(registry.getCircuitStates());
  if (states.length === 0) return 'No integrations used yet.';
  return states.map(([category, state]) => `  ${category}: ${state}`).join('\n');
}

/** Execute a parsed command. Resolves to the text to print, or undefined to quit. */
export async function runCommand(
  app: ToolgateApp,
  command: ConsoleCommand,
  signal?: AbortSignal,
): Promise<string | undefined> {
  switch (command.kind) {
    case 'empty':
      return '';
    case 'quit':
      return undefined;
    case 'tools':
      return formatCatalog(app.registry);
    case 'reload':
      return formatCatalog(await app.reload());
    case 'health':
      return formatHealth(app.registry);
    case 'invalid':
      return command.message;
    case 'invoke': {
      const result = await app.registry.invoke(command.tool, command.args, { signal });
      return `${formatInvocationResult(result)}\n(${result.status} in ${result.durationMs}ms)`;
    }
  }
}
