import { Instant } from "../domain/instant.js";

export interface ClockPort {
  now(): Instant;
}

/**
 * Wall-clock time from the host. Not monotonic: host clock adjustments
 * show up as-is, so two readings may go backwards.
 */
export class SystemClock implements ClockPort {
  now(): Instant {
    return Instant.fromEpochMilliseconds(Date.now());
  }
}
