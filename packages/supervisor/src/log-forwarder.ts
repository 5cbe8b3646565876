/**
 * LogForwarder — drains one worker output pipe into the observer.
 *
 * Lines are read via Node.js readline and reported with their stream tag.
 * The returned promise settles when the pipe closes (normally on process
 * exit) and never rejects, so the supervisor can fire and forget it.
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { toError, type IObserver, type OutputSource } from '@pulse/core';

export function forwardOutput(
  stream: Readable,
  source: OutputSource,
  observer: IObserver,
  pid?: number,
): Promise<void> {
  return new Promise<void>((resolve) => {
    const rl = createInterface({ input: stream, crlfDelay: Infinity });

    rl.on('line', (line: string) => {
      observer.onWorkerOutput({ source, line, pid, timestamp: new Date() });
    });

    rl.once('close', () => resolve());

    // readline re-emits input errors but does not close itself on them.
    let failed = false;
    const fail = (err: unknown) => {
      if (failed) return;
      failed = true;
      observer.onError(toError(err), { component: 'log-forwarder', source, pid });
      rl.close();
    };
    rl.on('error', fail);
    stream.once('error', fail);
  });
}
