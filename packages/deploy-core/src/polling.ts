import { setTimeout as delay } from 'node:timers/promises';

import { CancellationError } from './errors';

export type PollOptions = {
  /** Pause between attempts. */
  intervalMs: number;
  /** Upper bound for the whole wait; the last attempt runs at the deadline. */
  timeoutMs: number;
  signal?: AbortSignal;
  /** Human readable subject, used in cancellation messages. */
  description: string;
  resourceId?: string;
  now?: () => number;
};

/**
 * Calls `probe` until it yields a value other than `undefined`.
 *
 * Errors thrown by the probe propagate unchanged unless the signal was aborted meanwhile.
 * Abort and deadline both surface as {@link CancellationError}.
 */
export async function pollUntil<T>(probe: () => Promise<T | undefined>, options: PollOptions): Promise<T> {
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeoutMs;
  let attempt = 0;

  while (true) {
    throwIfAborted(options);
    attempt += 1;

    let result: T | undefined;
    try {
      result = await probe();
    } catch (err) {
      throwIfAborted(options);
      throw err;
    }
    if (result !== undefined) return result;

    const remaining = deadline - now();
    if (remaining <= 0) {
      throw new CancellationError(
        'timeout',
        `Timed out after ${options.timeoutMs}ms (${attempt} attempts) waiting for ${options.description}`,
        { resourceId: options.resourceId },
      );
    }

    try {
      await delay(Math.min(options.intervalMs, remaining), undefined, { signal: options.signal });
    } catch (err) {
      throwIfAborted(options);
      throw err;
    }
  }
}

function throwIfAborted(options: PollOptions): void {
  if (!options.signal?.aborted) return;
  throw new CancellationError('aborted', `Cancelled while waiting for ${options.description}`, {
    resourceId: options.resourceId,
    cause: options.signal.reason,
  });
}
