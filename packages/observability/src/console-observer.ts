/**
 * ConsoleObserver — structured console logging with ANSI color coding.
 *
 * Formats supervisor events as human-readable console output, respecting
 * the configured log level. Worker stdout is logged at info and stderr at
 * warn; exits and restart exhaustion are errors; passing health probes are
 * debug noise while failing ones are warnings.
 */

import type {
  IObserver,
  LogLevel,
  WorkerOutputEvent,
  WorkerLifecycleEvent,
  WorkerLifecycleType,
  HealthCheckEvent,
} from '@pulse/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Lifecycle event level mapping
// ---------------------------------------------------------------------------

const LIFECYCLE_LEVEL: Record<WorkerLifecycleType, LogLevel> = {
  spawned: 'info',
  adopted: 'info',
  exited: 'error',
  restart_scheduled: 'warn',
  restarted: 'info',
  restart_failed: 'error',
  restarts_exhausted: 'error',
  ready: 'info',
  shutdown_started: 'info',
  shutdown_complete: 'info',
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: FG.gray,
  info: FG.green,
  warn: FG.yellow,
  error: FG.red,
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  }

  private write(level: LogLevel, line: string): void {
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }

  // ---- IObserver ----------------------------------------------------------

  onWorkerOutput(event: WorkerOutputEvent): void {
    const level: LogLevel = event.source === 'stderr' ? 'warn' : 'info';
    if (!this.shouldLog(level)) return;
    const ts = this.timestamp();
    const pid = event.pid !== undefined ? ` ${DIM}pid=${event.pid}${RESET}` : '';
    this.write(
      level,
      `${DIM}${ts}${RESET} ${this.tag('WORKER', FG.blue)}${pid} ${event.line}`,
    );
  }

  onWorkerLifecycle(event: WorkerLifecycleEvent): void {
    const level = LIFECYCLE_LEVEL[event.type];
    if (!this.shouldLog(level)) return;
    const ts = this.timestamp();
    const color = LEVEL_COLOR[level];
    const fields =
      (event.pid !== undefined ? ` ${DIM}pid=${RESET}${event.pid}` : '') +
      (event.attempt !== undefined
        ? ` ${DIM}attempt=${RESET}${event.attempt}` +
          (event.maxRestarts !== undefined ? `/${event.maxRestarts}` : '')
        : '') +
      (event.delayMs !== undefined ? ` ${DIM}delay=${RESET}${this.formatDuration(event.delayMs)}` : '') +
      (event.exitCode !== undefined && event.exitCode !== null
        ? ` ${DIM}code=${RESET}${event.exitCode}`
        : '') +
      (event.signal ? ` ${DIM}signal=${RESET}${event.signal}` : '') +
      (event.diagnostics !== undefined
        ? ` ${DIM}diagnostics=${RESET}${JSON.stringify(event.diagnostics)}`
        : '') +
      (event.error ? ` ${DIM}error=${RESET}${event.error.message}` : '');
    this.write(
      level,
      `${DIM}${ts}${RESET} ${this.tag('SUPERVISOR', FG.cyan)} ${color}${event.type}${RESET}${fields}`,
    );
  }

  onHealthCheck(event: HealthCheckEvent): void {
    const level: LogLevel = event.ok ? 'debug' : 'warn';
    if (!this.shouldLog(level)) return;
    const ts = this.timestamp();
    const statusColor = event.ok ? FG.green : FG.red;
    const statusLabel = event.ok ? 'OK' : 'FAIL';
    this.write(
      level,
      `${DIM}${ts}${RESET} ${this.tag('HEALTH', FG.magenta)} ${statusColor}${statusLabel}${RESET}` +
        ` ${BOLD}${event.url}${RESET}` +
        (event.attempt !== undefined ? ` ${DIM}attempt=${RESET}${event.attempt}` : '') +
        (event.status !== undefined ? ` ${DIM}status=${RESET}${event.status}` : '') +
        ` ${DIM}duration=${RESET}${this.formatDuration(event.durationMs)}` +
        (event.error ? ` ${DIM}error=${RESET}${event.error.message}` : ''),
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ts = this.timestamp();
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}ctx=${RESET}${JSON.stringify(context)}` : '';
    console.error(
      `${DIM}${ts}${RESET} ${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
