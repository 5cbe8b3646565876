/**
 * Configuration shapes shared across packages.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface HealthCheckConfig {
  /** Worker liveness endpoint. */
  url: string;
  /** Per-probe request timeout. */
  timeoutMs: number;
  /** Probes attempted by the readiness wait before giving up. */
  maxRetries: number;
  /** Fixed pause between readiness probes. */
  retryDelayMs: number;
}

export interface WorkerConfig {
  /** Interpreter or executable to launch (e.g. 'python3'). */
  command: string;
  /** Arguments, normally the worker script path. */
  args: string[];
  /** Working directory for the worker. Defaults to the host's cwd. */
  cwd?: string;
  /** Variables added on top of the inherited environment. */
  extraEnv?: Record<string, string>;
  /** Cumulative restart budget for the supervisor's lifetime. */
  maxRestarts: number;
  /** Backoff before the first restart; doubles on each later attempt. */
  initialRestartDelayMs: number;
  /** How often the monitoring loop checks the child. */
  pollIntervalMs: number;
  healthCheck: HealthCheckConfig;
  /** Run without spawning when a healthy worker already answers the probe. */
  adoptExisting: boolean;
  /**
   * Reset the restart budget after the current child has stayed up this
   * long. 0 keeps the budget cumulative for the supervisor's lifetime.
   */
  resetRestartsAfterMs: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface ObservabilitySettings {
  observers: string[];
  logLevel: LogLevel;
}

export interface PulseConfig {
  server: ServerConfig;
  worker: WorkerConfig;
  observability: ObservabilitySettings;
}

/** Largest accepted `maxRestarts`; bounds the uncapped backoff growth. */
export const MAX_RESTARTS_LIMIT = 16;

export const DEFAULT_WORKER_CONFIG: Readonly<WorkerConfig> = {
  command: 'python3',
  args: ['python_scripts/async_server.py'],
  maxRestarts: 3,
  initialRestartDelayMs: 2_000,
  pollIntervalMs: 5_000,
  healthCheck: {
    url: 'http://127.0.0.1:8001/health',
    timeoutMs: 30_000,
    maxRetries: 12,
    retryDelayMs: 30_000,
  },
  adoptExisting: false,
  resetRestartsAfterMs: 0,
};
