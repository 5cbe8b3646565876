#!/usr/bin/env node
/**
 * pulse -- command-line entry point.
 *
 * Dispatches the first argument to a command module.
 */

import { serve } from './commands/serve.js';
import { workerHealth } from './commands/worker-health.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const RED = '\x1b[31m';

const COMMANDS: Record<string, (args: string[]) => Promise<void>> = {
  serve,
  'worker-health': workerHealth,
};

function printHelp(): void {
  console.log(`\n  ${CYAN}${BOLD}pulse${RESET} ${DIM}- analysis worker supervisor${RESET}\n`);
  console.log(`  ${BOLD}Usage${RESET}  pulse <command> [options]\n`);
  console.log(`  ${BOLD}Commands${RESET}`);
  console.log(`    serve                     Start the worker and the health gateway`);
  console.log(`    worker-health [--url U]   Probe the worker once and print its diagnostics`);
  console.log(`    help                      Show this message\n`);
  console.log(`  ${DIM}Configuration is read from ~/.pulse/config.json and PULSE_* variables.${RESET}\n`);
}

async function main(argv: string[]): Promise<void> {
  const [command = 'help', ...rest] = argv;

  if (command === 'help' || command === '--help' || command === '-h') {
    printHelp();
    return;
  }

  const run = COMMANDS[command];
  if (!run) {
    console.error(`\n  ${RED}Unknown command:${RESET} ${command}`);
    printHelp();
    process.exitCode = 1;
    return;
  }

  await run(rest);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`\n  ${RED}Fatal:${RESET} ${message}\n`);
  process.exitCode = 1;
});
