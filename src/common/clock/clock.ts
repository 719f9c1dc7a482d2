/**
 * Wall-clock source for TTL and cache arithmetic.
 * Injected under CLOCK so tests can drive time without real sleeps.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => Date.now(),
};
