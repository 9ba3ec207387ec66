/**
 * Time source for every window the kiosk measures (duplicate suppression,
 * lockout, session idle timeout). Wall clock by default.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
