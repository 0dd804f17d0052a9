/**
 * Backoff helpers
 */

export type Sleep = (ms: number) => Promise<void>;

export interface BackoffOptions {
  initialDelay: number;
  multiplier: number;
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay schedule for an exponential backoff: initialDelay, initialDelay * multiplier, ...
 */
export function* backoffDelays(options: BackoffOptions): Generator<number, never, void> {
  let delay = options.initialDelay;
  while (true) {
    yield delay;
    delay *= options.multiplier;
  }
}
