/**
 * Source of "now" for planners and the job store.
 * Injected so tests can pin time without touching global timers.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that always returns the same instant (or whatever was last set).
 */
export function createFixedClock(initial: Date): Clock & { set(instant: Date): void } {
  let current = new Date(initial.getTime());
  return {
    now: () => new Date(current.getTime()),
    set: (instant: Date) => {
      current = new Date(instant.getTime());
    },
  };
}
