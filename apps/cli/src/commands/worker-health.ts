/**
 * worker-health command -- probe the analysis worker once and print the
 * diagnostics it reports.
 *
 * Usage: pulse worker-health [--url <url>]
 */

import { HealthChecker } from '@pulse/supervisor';
import { loadConfig } from '../config.js';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';

export async function workerHealth(args: string[]): Promise<void> {
  let url: string;
  let timeoutMs: number;
  try {
    const { healthCheck } = loadConfig().worker;
    url = readFlag(args, '--url') ?? healthCheck.url;
    timeoutMs = healthCheck.timeoutMs;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${message}\n`);
    process.exitCode = 1;
    return;
  }

  const checker = new HealthChecker({ url, timeoutMs });
  const result = await checker.check();

  if (!result.ok) {
    console.error(`\n  ${RED}Worker unhealthy${RESET}  ${DIM}${url}${RESET}`);
    console.error(`  ${result.error.message}\n`);
    process.exitCode = 1;
    return;
  }

  console.log(`\n  ${GREEN}Worker healthy${RESET}  ${DIM}${url} (HTTP ${result.status})${RESET}`);
  console.log(JSON.stringify(result.diagnostics, null, 2));
  console.log('');
}

function readFlag(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  return args[index + 1];
}
