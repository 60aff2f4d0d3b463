/**
 * Chat Archiver — Reconnect Backoff
 *
 * The backoff state is the next delay in units (0 = fresh). The first
 * failure retries immediately and arms a 1-unit delay; each further
 * failure waits the current delay and doubles it. Once the delay would
 * exceed `maxDelayUnits` the caller must give up.
 *
 *   0, 1, 2, 4, 8, 16, 32, exhausted
 */

import type { ReconnectConfig } from '../config/types.js';

export const INITIAL_BACKOFF = 0;

export type BackoffStep =
  | { kind: 'retry'; delayUnits: number; delayMs: number; next: number }
  | { kind: 'exhausted'; delayUnits: number };

export function advanceBackoff(config: ReconnectConfig, state: number): BackoffStep {
  if (state <= 0) {
    return { kind: 'retry', delayUnits: 0, delayMs: 0, next: 1 };
  }
  if (state > config.maxDelayUnits) {
    return { kind: 'exhausted', delayUnits: state };
  }
  return {
    kind: 'retry',
    delayUnits: state,
    delayMs: state * config.unitMs,
    next: state * 2,
  };
}

/**
 * Sleep for the specified duration in milliseconds.
 * Optionally accepts an AbortSignal for cancellation (e.g. during shutdown).
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
