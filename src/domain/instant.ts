import { AppError } from "../infra/app-error.js";

const MAX_EPOCH_MS = 8.64e15;
const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;
export const MIN_UTC_OFFSET_MINUTES = -840;
export const MAX_UTC_OFFSET_MINUTES = 840;

const ISO_INSTANT_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|([+-])(\d{2}):(\d{2}))$/;

function invalidInstant(message: string): AppError {
  return new AppError(422, "invalid_instant", message);
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function assertUtcOffsetMinutes(value: number): void {
  if (!Number.isInteger(value) || value < MIN_UTC_OFFSET_MINUTES || value > MAX_UTC_OFFSET_MINUTES) {
    throw new AppError(
      422,
      "invalid_utc_offset",
      `UTC offset must be an integer between ${MIN_UTC_OFFSET_MINUTES} and ${MAX_UTC_OFFSET_MINUTES} minutes.`,
    );
  }
}

function parseIsoInstant(text: string): number {
  const match = ISO_INSTANT_PATTERN.exec(text);
  if (!match) {
    throw invalidInstant("Instant must be an ISO-8601 date-time with an explicit zone (Z or ±HH:MM).");
  }
  const [
    ,
    yearText,
    monthText,
    dayText,
    hourText,
    minuteText,
    secondText,
    fractionText,
    zone,
    sign,
    offsetHourText,
    offsetMinuteText,
  ] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText ?? "0");
  const millisecond = Number((fractionText ?? "").padEnd(3, "0").slice(0, 3));

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw invalidInstant("Instant contains an out-of-range calendar date.");
  }
  if (hour > 23 || minute > 59 || second > 59) {
    throw invalidInstant("Instant contains an out-of-range time of day.");
  }

  let offsetMinutes = 0;
  if (zone !== "Z") {
    const offsetHours = Number(offsetHourText);
    const offsetRemainder = Number(offsetMinuteText);
    if (offsetRemainder > 59) {
      throw invalidInstant("Instant contains an out-of-range UTC offset.");
    }
    offsetMinutes = (sign === "-" ? -1 : 1) * (offsetHours * 60 + offsetRemainder);
    if (offsetMinutes < MIN_UTC_OFFSET_MINUTES || offsetMinutes > MAX_UTC_OFFSET_MINUTES) {
      throw invalidInstant("Instant contains an out-of-range UTC offset.");
    }
  }

  // setUTCFullYear keeps years 0-99 literal, Date.UTC would shift them to 19xx.
  const wallClock = new Date(0);
  wallClock.setUTCFullYear(year, month - 1, day);
  wallClock.setUTCHours(hour, minute, second, millisecond);
  return wallClock.getTime() - offsetMinutes * MS_PER_MINUTE;
}

/**
 * An immutable point on the UTC timeline with millisecond precision.
 *
 * Instances are frozen; every accessor that hands out a mutable
 * representation (such as `toDate`) returns a fresh copy.
 */
export class Instant {
  private constructor(readonly epochMilliseconds: number) {
    Object.freeze(this);
  }

  static fromEpochMilliseconds(epochMilliseconds: number): Instant {
    if (!Number.isInteger(epochMilliseconds) || Math.abs(epochMilliseconds) > MAX_EPOCH_MS) {
      throw invalidInstant("Epoch milliseconds must be an integer within the representable date range.");
    }
    return new Instant(epochMilliseconds);
  }

  static fromDate(date: Date): Instant {
    const epochMilliseconds = date.getTime();
    if (Number.isNaN(epochMilliseconds)) {
      throw invalidInstant("Date is invalid.");
    }
    return new Instant(epochMilliseconds);
  }

  /** Parses ISO-8601 text exactly as given. Zoneless text is rejected since it does not name a single instant. */
  static parse(text: string): Instant {
    return Instant.fromEpochMilliseconds(parseIsoInstant(text));
  }

  toIsoString(): string {
    return new Date(this.epochMilliseconds).toISOString();
  }

  toDate(): Date {
    return new Date(this.epochMilliseconds);
  }

  toJSON(): string {
    return this.toIsoString();
  }

  toString(): string {
    return this.toIsoString();
  }

  equals(other: Instant): boolean {
    return this.epochMilliseconds === other.epochMilliseconds;
  }

  compare(other: Instant): number {
    return Math.sign(this.epochMilliseconds - other.epochMilliseconds);
  }

  isBefore(other: Instant): boolean {
    return this.epochMilliseconds < other.epochMilliseconds;
  }

  isAfter(other: Instant): boolean {
    return this.epochMilliseconds > other.epochMilliseconds;
  }

  /** Wall-clock hour (0-23) observed at the given UTC offset. */
  hourOfDay(utcOffsetMinutes = 0): number {
    assertUtcOffsetMinutes(utcOffsetMinutes);
    const localMs = this.epochMilliseconds + utcOffsetMinutes * MS_PER_MINUTE;
    return ((Math.floor(localMs / MS_PER_HOUR) % 24) + 24) % 24;
  }
}
