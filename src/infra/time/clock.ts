/** Time source. Injected so registries can be tested without real waits. */
export interface Clock {
  now(): number;
}

/** NestJS injection token for Clock. */
export const CLOCK = 'Clock' as const;

export const systemClock: Clock = {
  now: () => Date.now(),
};
