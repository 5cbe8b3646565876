/**
 * IWorkerSupervisor — the only operations the rest of the application may
 * call on the analysis worker's supervisor.
 */

export interface IWorkerSupervisor {
  /** Spawn the worker and resolve once it reports ready. */
  start(): Promise<void>;
  /** Kill the worker and stop supervising. Idempotent. */
  shutdown(): Promise<void>;
  /** One uncached liveness probe. */
  isHealthy(): Promise<boolean>;
}
