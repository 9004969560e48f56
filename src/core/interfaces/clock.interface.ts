/**
 * Time source, injected so verification and stale checks are testable
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
