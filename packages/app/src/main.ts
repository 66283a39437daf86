import * as path from 'node:path';
import * as readline from 'node:readline';
import { createConsoleLogger } from '@toolgate/core';
import { bootstrap } from './bootstrap.js';
import { formatCatalog, parseCommand, runCommand } from './console.js';

async function main(): Promise<void> {
  const configPath = process.env['TOOLGATE_CONFIG']
    ?? path.resolve(process.cwd(), 'config/default.json5');

  const logger = createConsoleLogger();
  const app = await bootstrap({ configPath, logger });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'tool> ',
  });

  let inFlight: AbortController | undefined;
  let closing = false;

  const shutdown = () => {
    if (closing) return;
    closing = true;
    app.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      },
    );
  };

  console.log(`Toolgate console, settings from ${configPath}`);
  console.log('Type a tool name and JSON5 arguments, /tools to list, /reload to re-read settings, /health for circuit states, /quit to exit.\n');
  console.log(formatCatalog(app.registry));
  rl.prompt();

  rl.on('line', (line: string) => {
    const controller = new AbortController();
    inFlight = controller;
    runCommand(app, parseCommand(line), controller.signal)
      .then(
        (output) => {
          if (output === undefined) {
            shutdown();
            return;
          }
          if (output) console.log(`${output}\n`);
        },
        (err: unknown) => console.error(`Error: ${err instanceof Error ? err.message : String(err)}\n`),
      )
      .finally(() => {
        if (inFlight === controller) inFlight = undefined;
        if (!closing) rl.prompt();
      });
  });

  // Ctrl+C cancels the running invocation, or exits when idle
  rl.on('SIGINT', () => {
    if (inFlight) {
      inFlight.abort();
    } else {
      rl.close();
    }
  });

  rl.on('close', shutdown);
  process.on('SIGTERM', shutdown);

  process.on('SIGHUP', () => {
    app.reload().then(
      (registry) => console.log(`\n${formatCatalog(registry)}\n`),
      (err: unknown) => logger.error(`Reload failed: ${err instanceof Error ? err.message : String(err)}`),
    );
  });
}

main().catch((err) => {
  console.error('Fatal:', err);
  process.exit(1);
});
