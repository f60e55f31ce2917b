/** Seconds since the epoch, with sub-second precision. */
export const getUnixEpoch = (nowMs: number = Date.now()) => nowMs / 1000;

/**
 * Epoch-seconds clock that never goes backwards, even if the wall clock is stepped
 * back (NTP correction). Consumers order channel messages by this timestamp.
 */
export const createEpochClock = (now: () => number = Date.now) => {
  let last = 0;
  return (): number => {
    last = Math.max(last, getUnixEpoch(now()));
    return last;
  };
};
