import { Instant } from "../../domain/instant.js";
import type { ClockPort } from "../../infra/clock.js";

export type FixedClockInput = Instant | Date | string;

function toInstant(input: FixedClockInput): Instant {
  if (input instanceof Instant) {
    return input;
  }
  if (input instanceof Date) {
    return Instant.fromDate(input);
  }
  return Instant.parse(input);
}

export class FixedClock implements ClockPort {
  private readonly instant: Instant;

  constructor(instant: FixedClockInput) {
    this.instant = toInstant(instant);
  }

  now(): Instant {
    return this.instant;
  }
}
