/**
 * Serve command -- run the supervised worker behind the health gateway.
 *
 * Starts the analysis worker and waits for it to become healthy, then
 * opens the HTTP health routes. SIGINT or SIGTERM stops the gateway,
 * kills the worker, and flushes the observer. A signal that arrives
 * while the worker is still starting cancels the start.
 */

import { toError, type IObserver, type IWorkerSupervisor, type PulseConfig } from '@pulse/core';
import { createObserver } from '@pulse/observability';
import { GatewayServer } from '@pulse/gateway';
import { WorkerProcessSupervisor, restartSchedule } from '@pulse/supervisor';
import { loadConfig } from '../config.js';

// ---------------------------------------------------------------------------
// ANSI color helpers
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';

// ---------------------------------------------------------------------------
// Core flow
// ---------------------------------------------------------------------------

const STOPPED = Symbol('stopped');

export interface ServeContext {
  config: PulseConfig;
  observer: IObserver;
  supervisor: IWorkerSupervisor;
  /** Settles when the server should shut down. */
  stop: Promise<unknown>;
}

/** Run until `stop` settles. Resolves with the process exit code. */
export async function runServe(ctx: ServeContext): Promise<number> {
  const { config, observer, supervisor } = ctx;

  // Watched from the start so a signal during the health wait is not lost.
  const stopRequested = ctx.stop.then(
    (): typeof STOPPED => STOPPED,
    (): typeof STOPPED => STOPPED,
  );

  let outcome: typeof STOPPED | undefined;
  try {
    outcome = await Promise.race([supervisor.start().then(() => undefined), stopRequested]);
  } catch (err) {
    const message = toError(err).message;
    console.error(`\n  ${RED}Worker failed to start:${RESET} ${message}\n`);
    await teardown(observer, supervisor, null);
    return 1;
  }

  if (outcome === STOPPED) {
    // shutdown() cancels the pending start.
    console.log(`\n  ${DIM}Shutting down...${RESET}`);
    return teardown(observer, supervisor, null);
  }

  const gateway = new GatewayServer({
    port: config.server.port,
    host: config.server.host,
    supervisor,
    observer,
  });

  try {
    await gateway.start();
  } catch (err) {
    const message = toError(err).message;
    console.error(`\n  ${RED}Gateway failed to start:${RESET} ${message}\n`);
    await teardown(observer, supervisor, null);
    return 1;
  }

  const addr = gateway.getAddress();
  const listening = addr ? `${addr.host}:${addr.port}` : `${config.server.host}:${config.server.port}`;
  console.log(`  ${GREEN}Listening${RESET}     http://${listening}/health`);
  console.log(`  ${DIM}Press Ctrl+C to stop.${RESET}\n`);

  await stopRequested;

  console.log(`\n  ${DIM}Shutting down...${RESET}`);
  return teardown(observer, supervisor, gateway);
}

async function teardown(
  observer: IObserver,
  supervisor: IWorkerSupervisor,
  gateway: GatewayServer | null,
): Promise<number> {
  let exitCode = 0;

  try {
    if (gateway) await gateway.stop();
  } catch (err) {
    observer.onError(toError(err), { component: 'cli', operation: 'gateway.stop' });
    exitCode = 1;
  }

  try {
    await supervisor.shutdown();
  } catch (err) {
    observer.onError(toError(err), { component: 'cli', operation: 'supervisor.shutdown' });
    exitCode = 1;
  }

  await observer.flush?.();
  return exitCode;
}

// ---------------------------------------------------------------------------
// Signals
// ---------------------------------------------------------------------------

/** Resolve with the first SIGINT or SIGTERM received. */
export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise<NodeJS.Signals>((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

export function formatSchedule(delaysMs: readonly number[]): string {
  if (delaysMs.length === 0) return 'none';
  return delaysMs.map((ms) => (ms % 1_000 === 0 ? `${ms / 1_000}s` : `${ms}ms`)).join(', ');
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function serve(_args: string[]): Promise<void> {
  let config: PulseConfig;
  try {
    config = loadConfig();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${message}\n`);
    process.exitCode = 1;
    return;
  }

  const { worker } = config;
  const schedule = restartSchedule({
    maxRestarts: worker.maxRestarts,
    initialDelayMs: worker.initialRestartDelayMs,
  });

  console.log(`\n  ${CYAN}${BOLD}Pulse worker supervisor${RESET}`);
  console.log(`  ${DIM}${'='.repeat(50)}${RESET}\n`);
  console.log(`  ${BOLD}Worker${RESET}        ${[worker.command, ...worker.args].join(' ')}`);
  console.log(`  ${BOLD}Health${RESET}        ${worker.healthCheck.url}`);
  console.log(`  ${BOLD}Restarts${RESET}      ${worker.maxRestarts} (backoff ${formatSchedule(schedule)})`);
  console.log('');

  const observer = createObserver(config.observability);
  const supervisor = new WorkerProcessSupervisor({ config: worker, observer });

  process.exitCode = await runServe({
    config,
    observer,
    supervisor,
    stop: waitForShutdownSignal(),
  });
}
