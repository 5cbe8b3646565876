/**
 * MultiObserver — fan-out observer that delegates to multiple child observers.
 *
 * Every IObserver method is forwarded to each child. Errors thrown by
 * individual children are caught and logged to stderr so that a single
 * broken observer never takes down the supervisor.
 */

import type {
  IObserver,
  WorkerOutputEvent,
  WorkerLifecycleEvent,
  HealthCheckEvent,
} from '@pulse/core';

export class MultiObserver implements IObserver {
  private readonly children: IObserver[];

  constructor(children: IObserver[]) {
    this.children = [...children];
  }

  // ---- helpers ------------------------------------------------------------

  private safely(fn: (child: IObserver) => void): void {
    for (const child of this.children) {
      try {
        fn(child);
      } catch (err) {
        console.error('[MultiObserver] child observer threw:', err);
      }
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onWorkerOutput(event: WorkerOutputEvent): void {
    this.safely((c) => c.onWorkerOutput(event));
  }

  onWorkerLifecycle(event: WorkerLifecycleEvent): void {
    this.safely((c) => c.onWorkerLifecycle(event));
  }

  onHealthCheck(event: HealthCheckEvent): void {
    this.safely((c) => c.onHealthCheck(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.safely((c) => c.onError(error, context));
  }

  async flush(): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await child.flush?.();
      } catch (err) {
        console.error('[MultiObserver] flush error in child observer:', err);
      }
    });
    await Promise.all(results);
  }
}
