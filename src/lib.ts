export { Instant, assertUtcOffsetMinutes } from "./domain/instant.js";
export { SystemClock, type ClockPort } from "./infra/clock.js";
export { FixedClock, type FixedClockInput } from "./adapters/inmemory/fixed-clock.js";
export {
  TimeOfDayService,
  dayPeriodForHour,
  type DayPeriod,
  type TimeOfDaySnapshot,
} from "./application/time-of-day.js";
export { AppError } from "./infra/app-error.js";
export { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
export { buildApp, type AppDependencies } from "./server.js";
export { ClockMetricsRegistry } from "./infra/metrics.js";
