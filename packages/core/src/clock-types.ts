/**
 * Clock abstraction — injectable for deterministic testing.
 */

export interface Clock {
  readonly now: () => number;
}

export const defaultClock: Clock = {
  now: () => Date.now(),
};
