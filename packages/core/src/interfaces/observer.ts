/**
 * IObserver — observability contract
 *
 * Structured observability for the worker supervisor: forwarded worker
 * output, lifecycle transitions, health probes, and background errors.
 */

export type OutputSource = 'stdout' | 'stderr';

export interface WorkerOutputEvent {
  source: OutputSource;
  line: string;
  pid?: number;
  timestamp: Date;
}

export type WorkerLifecycleType =
  | 'spawned'
  | 'adopted'
  | 'exited'
  | 'restart_scheduled'
  | 'restarted'
  | 'restart_failed'
  | 'restarts_exhausted'
  | 'ready'
  | 'shutdown_started'
  | 'shutdown_complete';

export interface WorkerLifecycleEvent {
  type: WorkerLifecycleType;
  pid?: number;
  /** Restart attempt number, starting at 1. */
  attempt?: number;
  maxRestarts?: number;
  delayMs?: number;
  exitCode?: number | null;
  signal?: string | null;
  diagnostics?: unknown;
  error?: Error;
  timestamp: Date;
}

export interface HealthCheckEvent {
  url: string;
  ok: boolean;
  status?: number;
  durationMs: number;
  /** Attempt number within a readiness wait; absent for ad-hoc probes. */
  attempt?: number;
  error?: Error;
  diagnostics?: unknown;
}

export interface IObserver {
  onWorkerOutput(event: WorkerOutputEvent): void;
  onWorkerLifecycle(event: WorkerLifecycleEvent): void;
  onHealthCheck(event: HealthCheckEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
