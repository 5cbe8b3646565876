/**
 * WorkerProcessSupervisor — owns the external analysis worker process.
 *
 * Spawns the worker via child_process.spawn, forwards its output to the
 * observer, blocks `start()` until the worker answers its health probe, and
 * runs a background monitoring loop that respawns the worker with
 * exponential backoff until the restart budget is spent.
 *
 * Shutdown aborts every pending wait through a single AbortController, so
 * its latency is bounded by kill + reap time rather than by poll or
 * backoff sleeps. Once shutdown has begun no new process is spawned.
 */

import { spawn as nodeSpawn, type SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import {
  ShutdownError,
  ShutdownRaceError,
  SpawnError,
  interruptibleSleep,
  toError,
  type IObserver,
  type IWorkerSupervisor,
  type WorkerConfig,
  type WorkerLifecycleEvent,
  type WorkerLifecycleType,
} from '@pulse/core';
import { NoopObserver } from '@pulse/observability';
import { resolveWorkerConfig, type WorkerConfigInput } from './config.js';
import { HealthChecker } from './health.js';
import { forwardOutput } from './log-forwarder.js';
import { mayRestart, restartDelay } from './restart-policy.js';

// ── Types ────────────────────────────────────────────────────────────────

/** The subset of ChildProcess the supervisor relies on. */
export interface WorkerProcess extends EventEmitter {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => WorkerProcess;

export type SupervisorStatus =
  | 'not_started'
  | 'spawning'
  | 'awaiting_health'
  | 'running'
  | 'restarting'
  | 'failed'
  | 'shutting_down'
  | 'terminated';

type Phase = Exclude<SupervisorStatus, 'shutting_down' | 'terminated'>;

export interface WorkerProcessSupervisorOptions {
  config?: WorkerConfigInput;
  observer?: IObserver;
  /** Process factory. Defaults to child_process.spawn. */
  spawn?: SpawnFn;
}

const defaultSpawn: SpawnFn = (command, args, options) => nodeSpawn(command, args, options);

// ── WorkerProcessSupervisor ──────────────────────────────────────────────

export class WorkerProcessSupervisor implements IWorkerSupervisor {
  readonly config: Readonly<WorkerConfig>;

  private readonly observer: IObserver;
  private readonly spawnFn: SpawnFn;
  private readonly health: HealthChecker;
  private readonly shutdownController = new AbortController();

  private child: WorkerProcess | null = null;
  private childStartedAt = 0;
  private restartCount = 0;
  private shuttingDown = false;
  private terminated = false;
  /** Running against a worker we found already healthy and did not spawn. */
  private adopted = false;
  private phase: Phase = 'not_started';

  private monitorTask: Promise<void> | null = null;
  private startPromise: Promise<void> | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: WorkerProcessSupervisorOptions = {}) {
    this.config = resolveWorkerConfig(options.config);
    this.observer = options.observer ?? new NoopObserver();
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.health = new HealthChecker({
      url: this.config.healthCheck.url,
      timeoutMs: this.config.healthCheck.timeoutMs,
      observer: this.observer,
    });
  }

  // ── Public API ───────────────────────────────────────────────────────

  /**
   * Spawn the worker and wait until it reports healthy.
   *
   * A second call spawns nothing and settles with the first call's
   * outcome. After a SpawnError the guard is cleared so the call can be
   * retried. A HealthCheckTimeoutError leaves the monitoring loop running;
   * callers that give up must still call `shutdown()`.
   */
  start(): Promise<void> {
    if (this.shuttingDown) {
      return Promise.reject(new ShutdownRaceError('Cannot start: supervisor has been shut down'));
    }
    if (!this.startPromise) {
      this.startPromise = this.doStart();
    }
    return this.startPromise;
  }

  /** One uncached probe. Always false once shutdown has begun. */
  async isHealthy(): Promise<boolean> {
    if (this.shuttingDown) return false;
    const result = await this.health.check(this.shutdownController.signal);
    return result.ok && !this.shuttingDown;
  }

  /**
   * Kill the worker and stop the monitoring loop. Idempotent: every call
   * returns the same promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown();
    }
    return this.shutdownPromise;
  }

  getStatus(): SupervisorStatus {
    if (this.terminated) return 'terminated';
    if (this.shuttingDown) return 'shutting_down';
    return this.phase;
  }

  getRestartCount(): number {
    return this.restartCount;
  }

  getPid(): number | undefined {
    return this.child?.pid;
  }

  // ── Internal: start ──────────────────────────────────────────────────

  private async doStart(): Promise<void> {
    if (this.config.adoptExisting) {
      const probe = await this.health.check(this.shutdownController.signal);
      if (probe.ok && !this.shuttingDown) {
        this.adopted = true;
        this.phase = 'running';
        this.emit('adopted', { diagnostics: probe.diagnostics });
        this.monitorTask = this.runMonitor();
        return;
      }
    }

    if (this.shuttingDown) {
      throw new ShutdownRaceError('Worker startup cancelled by shutdown');
    }

    this.phase = 'spawning';
    try {
      await this.spawnChild();
    } catch (err) {
      this.phase = 'not_started';
      this.startPromise = null;
      throw err;
    }

    if (this.shuttingDown) {
      throw new ShutdownRaceError('Worker startup cancelled by shutdown');
    }

    this.monitorTask = this.runMonitor();
    this.phase = 'awaiting_health';

    const { healthCheck } = this.config;
    const ready = await this.health.waitUntilReady({
      maxRetries: healthCheck.maxRetries,
      retryDelayMs: healthCheck.retryDelayMs,
      signal: this.shutdownController.signal,
    });

    if (this.phase === 'awaiting_health') {
      this.phase = 'running';
    }
    this.emit('ready', { pid: this.child?.pid, diagnostics: ready.diagnostics });
  }

  // ── Internal: spawn ──────────────────────────────────────────────────

  private async spawnChild(): Promise<WorkerProcess> {
    if (this.shuttingDown) {
      throw new ShutdownRaceError('Spawn cancelled by shutdown');
    }

    const { command, args, cwd, extraEnv } = this.config;
    const failure = (err: unknown) =>
      new SpawnError(`Failed to spawn worker: ${toError(err).message}`, command, {
        args: [...args],
      });

    let proc: WorkerProcess;
    try {
      proc = this.spawnFn(command, args, {
        cwd,
        env: { ...process.env, ...extraEnv },
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      throw failure(err);
    }

    // Stored before any await so a concurrent shutdown finds and kills it.
    this.child = proc;
    this.childStartedAt = Date.now();

    try {
      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          cleanup();
          resolve();
        };
        const onError = (err: Error) => {
          cleanup();
          reject(err);
        };
        const cleanup = () => {
          proc.off('spawn', onSpawn);
          proc.off('error', onError);
        };
        proc.once('spawn', onSpawn);
        proc.once('error', onError);
      });
    } catch (err) {
      if (this.child === proc) this.child = null;
      throw failure(err);
    }

    const pid = proc.pid;
    proc.on('error', (err: Error) => {
      this.observer.onError(err, { component: 'supervisor', pid });
    });
    if (proc.stdout) void forwardOutput(proc.stdout, 'stdout', this.observer, pid);
    if (proc.stderr) void forwardOutput(proc.stderr, 'stderr', this.observer, pid);

    this.emit('spawned', { pid });
    return proc;
  }

  // ── Internal: monitoring loop ────────────────────────────────────────

  private runMonitor(): Promise<void> {
    return this.monitor().catch((err: unknown) => {
      this.observer.onError(toError(err), { component: 'supervisor', operation: 'monitor' });
    });
  }

  private async monitor(): Promise<void> {
    const { maxRestarts, initialRestartDelayMs, pollIntervalMs } = this.config;

    while (!this.shuttingDown) {
      if (!(await this.needsRestart())) {
        this.maybeResetRestarts();
        if (!(await this.pause(pollIntervalMs))) return;
        continue;
      }
      if (this.shuttingDown) return;

      if (!mayRestart(this.restartCount, maxRestarts)) {
        this.phase = 'failed';
        this.emit('restarts_exhausted', { attempt: this.restartCount, maxRestarts });
        return;
      }

      // Incremented before the delay is computed so attempts count from 1.
      this.restartCount += 1;
      const attempt = this.restartCount;
      const delayMs = restartDelay(attempt, initialRestartDelayMs);
      this.phase = 'restarting';
      this.emit('restart_scheduled', { attempt, maxRestarts, delayMs });

      if (!(await this.pause(delayMs))) return;

      try {
        const proc = await this.spawnChild();
        this.adopted = false;
        this.phase = 'running';
        this.emit('restarted', { pid: proc.pid, attempt, maxRestarts });
      } catch (err) {
        if (err instanceof ShutdownRaceError) return;
        this.emit('restart_failed', { attempt, maxRestarts, error: toError(err) });
        if (!(await this.pause(pollIntervalMs))) return;
      }
    }
  }

  private async needsRestart(): Promise<boolean> {
    const child = this.child;
    if (child) {
      if (child.exitCode === null && child.signalCode === null) return false;
      this.child = null;
      this.emit('exited', {
        pid: child.pid,
        exitCode: child.exitCode,
        signal: child.signalCode,
      });
      return true;
    }

    if (this.adopted) {
      const result = await this.health.check(this.shutdownController.signal);
      return !result.ok && !this.shuttingDown;
    }

    return true;
  }

  private maybeResetRestarts(): void {
    const { resetRestartsAfterMs } = this.config;
    if (resetRestartsAfterMs <= 0 || this.restartCount === 0 || !this.child) return;
    if (Date.now() - this.childStartedAt >= resetRestartsAfterMs) {
      this.restartCount = 0;
    }
  }

  /** Sleep unless shutdown interrupts; false means stop. */
  private async pause(ms: number): Promise<boolean> {
    try {
      await interruptibleSleep(ms, this.shutdownController.signal);
      return true;
    } catch (err) {
      if (err instanceof ShutdownRaceError) return false;
      throw err;
    }
  }

  // ── Internal: shutdown ───────────────────────────────────────────────

  private async doShutdown(): Promise<void> {
    this.shuttingDown = true;
    const child = this.child;
    this.child = null;

    this.emit('shutdown_started', { pid: child?.pid });
    this.shutdownController.abort();

    // A failed kill still ends supervision; the ShutdownError carries the pid.
    try {
      if (child) await this.terminate(child);
    } finally {
      await this.monitorTask;
      this.terminated = true;
      this.emit('shutdown_complete', {});
    }
  }

  private async terminate(child: WorkerProcess): Promise<void> {
    if (child.exitCode !== null || child.signalCode !== null) return;
    const pid = child.pid;
    if (pid === undefined) return;

    const exited = new Promise<void>((resolve) => {
      child.once('exit', () => resolve());
    });

    let delivered: boolean;
    try {
      delivered = child.kill('SIGKILL');
    } catch (err) {
      throw new ShutdownError(`Failed to kill worker: ${toError(err).message}`, { pid });
    }

    // kill() returns false when the process is already gone.
    if (delivered) await exited;
  }

  // ── Internal: events ─────────────────────────────────────────────────

  private emit(
    type: WorkerLifecycleType,
    fields: Omit<WorkerLifecycleEvent, 'type' | 'timestamp'>,
  ): void {
    this.observer.onWorkerLifecycle({ type, ...fields, timestamp: new Date() });
  }
}
