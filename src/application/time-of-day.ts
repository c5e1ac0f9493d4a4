import { assertUtcOffsetMinutes, type Instant } from "../domain/instant.js";
import type { ClockPort } from "../infra/clock.js";

export type DayPeriod = "night" | "morning" | "afternoon" | "evening";

export interface TimeOfDaySnapshot {
  instant: Instant;
  hour: number;
  period: DayPeriod;
  utcOffsetMinutes: number;
}

interface TimeOfDayServiceOptions {
  utcOffsetMinutes?: number;
}

export function dayPeriodForHour(hour: number): DayPeriod {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new RangeError(`hour must be an integer between 0 and 23, received ${hour}`);
  }
  if (hour < 5) {
    return "night";
  }
  if (hour < 12) {
    return "morning";
  }
  if (hour < 18) {
    return "afternoon";
  }
  if (hour < 22) {
    return "evening";
  }
  return "night";
}

export class TimeOfDayService {
  private readonly utcOffsetMinutes: number;

  constructor(
    private readonly clock: ClockPort,
    options: TimeOfDayServiceOptions = {},
  ) {
    this.utcOffsetMinutes = options.utcOffsetMinutes ?? 0;
    assertUtcOffsetMinutes(this.utcOffsetMinutes);
  }

  currentHour(): number {
    return this.clock.now().hourOfDay(this.utcOffsetMinutes);
  }

  // Reads the clock once so hour and period never straddle a boundary.
  snapshot(): TimeOfDaySnapshot {
    const instant = this.clock.now();
    const hour = instant.hourOfDay(this.utcOffsetMinutes);
    return {
      instant,
      hour,
      period: dayPeriodForHour(hour),
      utcOffsetMinutes: this.utcOffsetMinutes,
    };
  }

  withUtcOffset(utcOffsetMinutes: number): TimeOfDayService {
    return new TimeOfDayService(this.clock, { utcOffsetMinutes });
  }
}
