import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  HealthCheckTimeoutError,
  ShutdownError,
  ShutdownRaceError,
  SpawnError,
  type HealthCheckEvent,
  type IObserver,
  type WorkerLifecycleEvent,
  type WorkerLifecycleType,
  type WorkerOutputEvent,
} from '@pulse/core';
import { WorkerProcessSupervisor, type WorkerProcess } from './process-supervisor.js';
import type { WorkerConfigInput } from './config.js';

// ── Test doubles ─────────────────────────────────────────────────────────

const URL = 'http://127.0.0.1:8001/health';
let nextPid = 1000;

class FakeWorker extends EventEmitter implements WorkerProcess {
  readonly pid?: number;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn((signal?: NodeJS.Signals | number): boolean => {
    queueMicrotask(() => this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM'));
    return true;
  });

  constructor(failWith?: Error) {
    super();
    this.pid = failWith ? undefined : nextPid++;
    queueMicrotask(() => {
      if (failWith) this.emit('error', failWith);
      else this.emit('spawn');
    });
  }

  /** Simulate the process ending on its own (crash or external kill). */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.stdout.end();
    this.stderr.end();
    this.emit('exit', code, signal);
  }
}

class RecordingObserver implements IObserver {
  readonly lifecycle: WorkerLifecycleEvent[] = [];
  readonly output: WorkerOutputEvent[] = [];
  readonly probes: HealthCheckEvent[] = [];
  readonly errors: Error[] = [];

  onWorkerOutput(event: WorkerOutputEvent): void {
    this.output.push(event);
  }
  onWorkerLifecycle(event: WorkerLifecycleEvent): void {
    this.lifecycle.push(event);
  }
  onHealthCheck(event: HealthCheckEvent): void {
    this.probes.push(event);
  }
  onError(error: Error): void {
    this.errors.push(error);
  }

  types(): WorkerLifecycleType[] {
    return this.lifecycle.map((e) => e.type);
  }

  ofType(type: WorkerLifecycleType): WorkerLifecycleEvent[] {
    return this.lifecycle.filter((e) => e.type === type);
  }
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const BASE_CONFIG: WorkerConfigInput = {
  command: 'python3',
  args: ['worker.py'],
  maxRestarts: 3,
  initialRestartDelayMs: 100,
  pollIntervalMs: 50,
  healthCheck: { url: URL, timeoutMs: 1_000, maxRetries: 3, retryDelayMs: 100 },
};

// ── Tests ────────────────────────────────────────────────────────────────

describe('WorkerProcessSupervisor', () => {
  let workers: FakeWorker[];
  let spawnFailures: Array<Error | undefined>;
  let observer: RecordingObserver;
  let supervisor: WorkerProcessSupervisor | undefined;

  const spawn = vi.fn(
    (_command: string, _args: readonly string[], _options: SpawnOptions): WorkerProcess => {
      const worker = new FakeWorker(spawnFailures.shift());
      workers.push(worker);
      return worker;
    },
  );

  const fetchMock = () => vi.mocked(globalThis.fetch);
  const healthy = () =>
    fetchMock().mockImplementation(async () => jsonResponse({ status: 'healthy' }));
  const unhealthy = () =>
    fetchMock().mockImplementation(async () => jsonResponse({ error: 'loading' }, 503));

  /** Yield to the real event loop so pending microtasks and stream ticks run. */
  const settle = () => vi.advanceTimersByTimeAsync(0);

  function create(config: WorkerConfigInput = {}): WorkerProcessSupervisor {
    supervisor = new WorkerProcessSupervisor({
      config: {
        ...BASE_CONFIG,
        ...config,
        healthCheck: { ...BASE_CONFIG.healthCheck, ...config.healthCheck },
      },
      observer,
      spawn,
    });
    return supervisor;
  }

  function worker(index: number): FakeWorker {
    const found = workers[index];
    if (!found) throw new Error(`no worker #${index} was spawned`);
    return found;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(globalThis, 'fetch');
    workers = [];
    spawnFailures = [];
    observer = new RecordingObserver();
    supervisor = undefined;
    spawn.mockClear();
  });

  afterEach(async () => {
    await supervisor?.shutdown().catch(() => undefined);
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('start', () => {
    it('spawns the worker and resolves once it is healthy', async () => {
      healthy();
      const sup = create();

      await sup.start();

      expect(spawn).toHaveBeenCalledTimes(1);
      expect(spawn).toHaveBeenCalledWith(
        'python3',
        ['worker.py'],
        expect.objectContaining({ stdio: ['ignore', 'pipe', 'pipe'] }),
      );
      expect(sup.getStatus()).toBe('running');
      expect(sup.getPid()).toBe(worker(0).pid);
      expect(observer.types()).toEqual(['spawned', 'ready']);
      expect(observer.ofType('ready')[0]).toMatchObject({
        pid: worker(0).pid,
        diagnostics: { status: 'healthy' },
      });
    });

    it('passes extra environment variables and cwd to the worker', async () => {
      healthy();
      const sup = create({ cwd: '/srv/worker', extraEnv: { PULSE_TEST: '1' } });

      await sup.start();

      const options = spawn.mock.calls[0]?.[2];
      expect(options?.cwd).toBe('/srv/worker');
      expect(options?.env?.['PULSE_TEST']).toBe('1');
    });

    it('rejects with SpawnError when the process cannot be created', async () => {
      healthy();
      spawnFailures = [new Error('spawn python3 ENOENT')];
      const sup = create();

      const error = await sup.start().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SpawnError);
      expect(error).toMatchObject({
        message: 'Failed to spawn worker: spawn python3 ENOENT',
        command: 'python3',
      });
      expect(fetchMock()).not.toHaveBeenCalled();
      expect(sup.getStatus()).toBe('not_started');
    });

    it('does not start the monitoring loop after a spawn failure', async () => {
      healthy();
      spawnFailures = [new Error('spawn python3 ENOENT')];
      const sup = create();

      await sup.start().catch(() => undefined);
      await vi.advanceTimersByTimeAsync(10_000);

      expect(spawn).toHaveBeenCalledTimes(1);
      expect(sup.getRestartCount()).toBe(0);
    });

    it('can be retried after a spawn failure', async () => {
      healthy();
      spawnFailures = [new Error('spawn python3 EAGAIN')];
      const sup = create();

      await expect(sup.start()).rejects.toBeInstanceOf(SpawnError);
      await sup.start();

      expect(spawn).toHaveBeenCalledTimes(2);
      expect(sup.getStatus()).toBe('running');
    });

    it('rejects with HealthCheckTimeoutError when the worker never becomes ready', async () => {
      unhealthy();
      const sup = create();

      const assertion = expect(sup.start()).rejects.toBeInstanceOf(HealthCheckTimeoutError);
      await vi.advanceTimersByTimeAsync(200);
      await assertion;

      expect(fetchMock()).toHaveBeenCalledTimes(3);
      expect(sup.getStatus()).toBe('awaiting_health');
      expect(sup.getPid()).toBe(worker(0).pid);
    });

    it('becomes ready on the third probe after two failures', async () => {
      fetchMock()
        .mockImplementationOnce(async () => jsonResponse({}, 500))
        .mockImplementationOnce(async () => jsonResponse({}, 500))
        .mockImplementation(async () => jsonResponse({ status: 'healthy', primary_detector: 'nrclex' }));
      const sup = create();

      const started = sup.start();
      await vi.advanceTimersByTimeAsync(200);
      await started;

      expect(observer.probes.map((p) => p.ok)).toEqual([false, false, true]);
      expect(observer.ofType('ready')[0]?.diagnostics).toEqual({
        status: 'healthy',
        primary_detector: 'nrclex',
      });
    });

    it('shares one start between concurrent callers', async () => {
      healthy();
      const sup = create();

      const first = sup.start();
      const second = sup.start();
      expect(second).toBe(first);
      await Promise.all([first, second]);

      expect(spawn).toHaveBeenCalledTimes(1);
    });

    it('rejects after shutdown without spawning', async () => {
      const sup = create();
      await sup.shutdown();

      await expect(sup.start()).rejects.toBeInstanceOf(ShutdownRaceError);
      expect(spawn).not.toHaveBeenCalled();
    });

    it('rejects with ShutdownRaceError when shutdown interrupts the health wait', async () => {
      unhealthy();
      const sup = create({ healthCheck: { maxRetries: 12, retryDelayMs: 30_000 } });

      const started = sup.start();
      const assertion = expect(started).rejects.toBeInstanceOf(ShutdownRaceError);
      await settle();
      await sup.shutdown();
      await assertion;

      expect(fetchMock()).toHaveBeenCalledTimes(1);
      expect(worker(0).kill).toHaveBeenCalledWith('SIGKILL');
    });

    it('kills a worker whose spawn raced with shutdown', async () => {
      healthy();
      const sup = create();

      const started = sup.start();
      const stopped = sup.shutdown();

      await expect(started).rejects.toBeInstanceOf(ShutdownRaceError);
      await stopped;

      expect(spawn).toHaveBeenCalledTimes(1);
      expect(worker(0).kill).toHaveBeenCalledWith('SIGKILL');
      expect(fetchMock()).not.toHaveBeenCalled();
    });
  });

  describe('adoptExisting', () => {
    it('runs without spawning when a healthy worker already answers', async () => {
      healthy();
      const sup = create({ adoptExisting: true });

      await sup.start();

      expect(spawn).not.toHaveBeenCalled();
      expect(sup.getStatus()).toBe('running');
      expect(sup.getPid()).toBeUndefined();
      expect(observer.types()).toEqual(['adopted']);
    });

    it('spawns a replacement once the adopted worker stops answering', async () => {
      healthy();
      const sup = create({ adoptExisting: true });
      await sup.start();

      unhealthy();
      await vi.advanceTimersByTimeAsync(150);

      expect(spawn).toHaveBeenCalledTimes(1);
      expect(observer.types()).toEqual(['adopted', 'restart_scheduled', 'spawned', 'restarted']);
      expect(sup.getPid()).toBe(worker(0).pid);
    });

    it('spawns normally when nothing answers the first probe', async () => {
      fetchMock()
        .mockImplementationOnce(async () => jsonResponse({}, 503))
        .mockImplementation(async () => jsonResponse({ status: 'healthy' }));
      const sup = create({ adoptExisting: true });

      await sup.start();

      expect(spawn).toHaveBeenCalledTimes(1);
      expect(observer.types()).toEqual(['spawned', 'ready']);
    });
  });

  describe('monitoring loop', () => {
    it('restarts a crashed worker after the backoff delay', async () => {
      healthy();
      const sup = create();
      await sup.start();

      worker(0).exit(1);
      await vi.advanceTimersByTimeAsync(50);

      expect(observer.ofType('exited')[0]).toMatchObject({
        pid: worker(0).pid,
        exitCode: 1,
        signal: null,
      });
      expect(observer.ofType('restart_scheduled')[0]).toMatchObject({
        attempt: 1,
        maxRestarts: 3,
        delayMs: 100,
      });
      expect(sup.getStatus()).toBe('restarting');

      await vi.advanceTimersByTimeAsync(99);
      expect(spawn).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      expect(spawn).toHaveBeenCalledTimes(2);
      expect(observer.ofType('restarted')[0]).toMatchObject({ attempt: 1, pid: worker(1).pid });
      expect(sup.getStatus()).toBe('running');
      expect(sup.getRestartCount()).toBe(1);
    });

    it('detects a worker killed by a signal', async () => {
      healthy();
      const sup = create();
      await sup.start();

      worker(0).exit(null, 'SIGKILL');
      await vi.advanceTimersByTimeAsync(50);

      expect(observer.ofType('exited')[0]).toMatchObject({ exitCode: null, signal: 'SIGKILL' });
    });

    it('makes exactly maxRestarts attempts with doubling delays, then gives up', async () => {
      healthy();
      const sup = create({ maxRestarts: 2, initialRestartDelayMs: 1_000 });
      await sup.start();

      worker(0).exit(1);
      await vi.advanceTimersByTimeAsync(50 + 1_000);
      expect(spawn).toHaveBeenCalledTimes(2);

      worker(1).exit(1);
      await vi.advanceTimersByTimeAsync(50 + 2_000);
      expect(spawn).toHaveBeenCalledTimes(3);

      worker(2).exit(1);
      await vi.advanceTimersByTimeAsync(50);

      expect(observer.ofType('restart_scheduled').map((e) => e.delayMs)).toEqual([1_000, 2_000]);
      expect(observer.ofType('restarts_exhausted')).toHaveLength(1);
      expect(observer.ofType('restarts_exhausted')[0]).toMatchObject({ attempt: 2, maxRestarts: 2 });
      expect(sup.getStatus()).toBe('failed');

      await vi.advanceTimersByTimeAsync(60_000);
      expect(spawn).toHaveBeenCalledTimes(3);
    });

    it('never restarts with a zero budget', async () => {
      healthy();
      const sup = create({ maxRestarts: 0 });
      await sup.start();

      worker(0).exit(1);
      await vi.advanceTimersByTimeAsync(1_000);

      expect(spawn).toHaveBeenCalledTimes(1);
      expect(observer.types()).toEqual(['spawned', 'ready', 'exited', 'restarts_exhausted']);
    });

    it('reports a failed respawn and tries again with the next attempt', async () => {
      healthy();
      spawnFailures = [undefined, new Error('spawn python3 EAGAIN')];
      const sup = create();
      await sup.start();

      worker(0).exit(1);
      await vi.advanceTimersByTimeAsync(50 + 100 + 50 + 200);

      expect(spawn).toHaveBeenCalledTimes(3);
      const failed = observer.ofType('restart_failed')[0];
      expect(failed).toMatchObject({ attempt: 1 });
      expect(failed?.error).toBeInstanceOf(SpawnError);
      expect(observer.ofType('restarted')[0]).toMatchObject({ attempt: 2, pid: worker(2).pid });
      expect(sup.getRestartCount()).toBe(2);
    });

    it('keeps the restart budget cumulative by default', async () => {
      healthy();
      const sup = create();
      await sup.start();

      worker(0).exit(1);
      await vi.advanceTimersByTimeAsync(150);
      await vi.advanceTimersByTimeAsync(60_000);

      expect(sup.getRestartCount()).toBe(1);
    });

    it('resets the restart budget once a worker stays up long enough', async () => {
      healthy();
      const sup = create({ resetRestartsAfterMs: 1_000 });
      await sup.start();

      worker(0).exit(1);
      await vi.advanceTimersByTimeAsync(150);
      expect(sup.getRestartCount()).toBe(1);

      await vi.advanceTimersByTimeAsync(950);
      expect(sup.getRestartCount()).toBe(1);

      await vi.advanceTimersByTimeAsync(50);
      expect(sup.getRestartCount()).toBe(0);
    });

    it('forwards worker output to the observer', async () => {
      healthy();
      const sup = create();
      await sup.start();

      worker(0).stdout.write('model loaded\n');
      worker(0).stderr.write('deprecation warning\n');
      await settle();

      expect(observer.output.map(({ source, line, pid }) => ({ source, line, pid }))).toEqual([
        { source: 'stdout', line: 'model loaded', pid: worker(0).pid },
        { source: 'stderr', line: 'deprecation warning', pid: worker(0).pid },
      ]);
    });
  });

  describe('isHealthy', () => {
    it('reflects a single live probe', async () => {
      healthy();
      const sup = create();
      await sup.start();

      await expect(sup.isHealthy()).resolves.toBe(true);
      unhealthy();
      await expect(sup.isHealthy()).resolves.toBe(false);
    });

    it('is false after shutdown without probing', async () => {
      healthy();
      const sup = create();
      await sup.start();
      await sup.shutdown();
      fetchMock().mockClear();

      await expect(sup.isHealthy()).resolves.toBe(false);
      expect(fetchMock()).not.toHaveBeenCalled();
    });
  });

  describe('shutdown', () => {
    it('kills the worker with SIGKILL and waits for it to exit', async () => {
      healthy();
      const sup = create();
      await sup.start();

      await sup.shutdown();

      expect(worker(0).kill).toHaveBeenCalledTimes(1);
      expect(worker(0).kill).toHaveBeenCalledWith('SIGKILL');
      expect(worker(0).signalCode).toBe('SIGKILL');
      expect(sup.getStatus()).toBe('terminated');
      expect(sup.getPid()).toBeUndefined();
      expect(observer.types().slice(-2)).toEqual(['shutdown_started', 'shutdown_complete']);
    });

    it('is idempotent', async () => {
      healthy();
      const sup = create();
      await sup.start();

      const first = sup.shutdown();
      const second = sup.shutdown();
      expect(second).toBe(first);
      await Promise.all([first, second]);
      await sup.shutdown();

      expect(worker(0).kill).toHaveBeenCalledTimes(1);
      expect(observer.ofType('shutdown_complete')).toHaveLength(1);
    });

    it('returns promptly during a long backoff and spawns nothing afterwards', async () => {
      healthy();
      const sup = create({ initialRestartDelayMs: 60_000 });
      await sup.start();

      worker(0).exit(1);
      await vi.advanceTimersByTimeAsync(50);
      expect(observer.ofType('restart_scheduled')[0]).toMatchObject({ delayMs: 60_000 });

      await sup.shutdown();
      expect(sup.getStatus()).toBe('terminated');

      await vi.advanceTimersByTimeAsync(120_000);
      expect(spawn).toHaveBeenCalledTimes(1);
    });

    it('does not signal a worker that has already exited', async () => {
      healthy();
      const sup = create({ pollIntervalMs: 60_000 });
      await sup.start();

      worker(0).exit(0);
      await sup.shutdown();

      expect(worker(0).kill).not.toHaveBeenCalled();
    });

    it('rejects with ShutdownError when the kill throws but still terminates', async () => {
      healthy();
      const sup = create();
      await sup.start();
      worker(0).kill.mockImplementationOnce(() => {
        throw new Error('EPERM');
      });

      const error = await sup.shutdown().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ShutdownError);
      expect(error).toMatchObject({
        message: 'Failed to kill worker: EPERM',
        context: { pid: worker(0).pid },
      });
      expect(sup.getStatus()).toBe('terminated');
      expect(observer.types().slice(-2)).toEqual(['shutdown_started', 'shutdown_complete']);
      await expect(sup.isHealthy()).resolves.toBe(false);
    });
  });
});
