/**
 * Clock port. The domain and the services never call Date.now() directly;
 * they receive a Clock so tests can pin or advance time.
 */

export interface Clock {
  /** ISO-8601 timestamp */
  now(): string;
}

export interface ControllableClock extends Clock {
  advance(ms: number): void;
}

export const createRealClock = (): Clock => ({
  now: () => new Date().toISOString(),
});

/** Always reports the same instant. */
export const createFixedClock = (isoTime: string): Clock => {
  const fixed = new Date(isoTime).toISOString();
  return { now: () => fixed };
};

/** Starts at a given instant and only moves when advanced. */
export const createControllableClock = (isoTime: string): ControllableClock => {
  let epochMs = Date.parse(isoTime);
  return {
    now: () => new Date(epochMs).toISOString(),
    advance: (ms) => {
      epochMs += ms;
    },
  };
};
