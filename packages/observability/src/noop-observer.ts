/**
 * NoopObserver — silent observer that discards all events.
 *
 * Used when observability is explicitly disabled and as the supervisor's
 * default when no observer is supplied.
 */

import type {
  IObserver,
  WorkerOutputEvent,
  WorkerLifecycleEvent,
  HealthCheckEvent,
} from '@pulse/core';

export class NoopObserver implements IObserver {
  onWorkerOutput(_event: WorkerOutputEvent): void {
    // intentionally empty
  }

  onWorkerLifecycle(_event: WorkerLifecycleEvent): void {
    // intentionally empty
  }

  onHealthCheck(_event: HealthCheckEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
