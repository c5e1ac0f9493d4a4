import { describe, expect, it } from "vitest";
import {
  AppError,
  FixedClock,
  Instant,
  SystemClock,
  TimeOfDayService,
  type ClockPort,
} from "../src/lib.js";
import { describeClockContract } from "./clock-contract.js";

describeClockContract({
  name: "SystemClock",
  make: () => new SystemClock(),
});

describeClockContract({
  name: "FixedClock",
  make: () => new FixedClock("2023-01-01T09:00:00Z"),
});

describe("SystemClock", () => {
  it("reads the host wall clock", () => {
    const clock = new SystemClock();
    const before = Date.now();
    const now = clock.now();
    const after = Date.now();

    expect(now.epochMilliseconds).toBeGreaterThanOrEqual(before);
    expect(now.epochMilliseconds).toBeLessThanOrEqual(after);
  });

  it("can be used wherever the clock port is expected", () => {
    const clock: ClockPort = new SystemClock();
    expect(clock.now()).toBeInstanceOf(Instant);
  });
});

describe("FixedClock", () => {
  it("returns exactly the instant it was built with", () => {
    const clock = new FixedClock("2023-01-01T09:00:00Z");

    expect(clock.now().toIsoString()).toBe("2023-01-01T09:00:00.000Z");
    expect(clock.now().epochMilliseconds).toBe(1_672_563_600_000);
  });

  it("returns the same value on every call", () => {
    const instant = Instant.parse("2023-01-01T15:00:00Z");
    const clock = new FixedClock(instant);

    for (let call = 0; call < 100; call += 1) {
      expect(clock.now()).toBe(instant);
    }
  });

  it("accepts a Date and ignores later mutation of it", () => {
    const date = new Date("2023-01-01T19:00:00.000Z");
    const clock = new FixedClock(date);
    date.setUTCHours(3);

    expect(clock.now().toIsoString()).toBe("2023-01-01T19:00:00.000Z");
  });

  it("is not affected by mutating a Date obtained from its reading", () => {
    const clock = new FixedClock("2023-01-01T19:00:00Z");
    const copy = clock.now().toDate();
    copy.setUTCFullYear(1999);

    expect(clock.now().toIsoString()).toBe("2023-01-01T19:00:00.000Z");
  });

  it("rejects an instant without an explicit zone", () => {
    expect(() => new FixedClock("2023-01-01T09:00:00")).toThrowError(AppError);
  });

  it("feeds a consumer the hour of day it was set to", () => {
    expect(new TimeOfDayService(new FixedClock("2023-01-01T15:00:00Z")).currentHour()).toBe(15);
    expect(new TimeOfDayService(new FixedClock("2023-01-01T19:00:00Z")).currentHour()).toBe(19);
  });

  it("keeps separate instances independent", () => {
    const morning = new FixedClock("2023-01-01T09:00:00Z");
    const evening = new FixedClock("2023-01-01T19:00:00Z");

    expect(morning.now().toIsoString()).toBe("2023-01-01T09:00:00.000Z");
    expect(evening.now().toIsoString()).toBe("2023-01-01T19:00:00.000Z");
    expect(morning.now().toIsoString()).toBe("2023-01-01T09:00:00.000Z");
    expect(morning.now().equals(evening.now())).toBe(false);
  });
});
