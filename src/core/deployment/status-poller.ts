/**
 * Status polling
 *
 * Re-queries a status until it reaches a terminal value, the attempt budget
 * runs out, or the caller aborts. Each attempt is a fresh query; nothing is cached.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { getComponentLogger } from '../logging/index.js';

export interface PollOptions<T> {
  maxAttempts: number;
  /** Pause between attempts */
  pauseMs: number;
  terminal: (value: T) => boolean;
  signal?: AbortSignal;
}

export interface PollResult<T> {
  value: T;
  attempts: number;
  /** false when the attempt budget ran out first */
  reachedTerminal: boolean;
}

const logger = getComponentLogger('status-poller');

/**
 * @throws the signal's abort reason once the signal fires
 */
export async function pollUntilTerminal<T>(
  fetch: () => Promise<T>,
  options: PollOptions<T>
): Promise<PollResult<T>> {
  const { maxAttempts, pauseMs, terminal, signal } = options;
  if (maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${maxAttempts}`);
  }

  let attempt = 0;
  for (;;) {
    signal?.throwIfAborted();
    attempt++;
    const value = await fetch();

    if (terminal(value)) {
      return { value, attempts: attempt, reachedTerminal: true };
    }
    if (attempt >= maxAttempts) {
      logger.debug('Polling stopped before a terminal state', { attempts: attempt });
      return { value, attempts: attempt, reachedTerminal: false };
    }

    await sleep(pauseMs, undefined, { signal });
  }
}
