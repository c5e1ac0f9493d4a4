import {
  Instant,
  MAX_UTC_OFFSET_MINUTES,
  MIN_UTC_OFFSET_MINUTES,
} from "../domain/instant.js";
import { AppError } from "./app-error.js";

export const CLOCK_SOURCES = ["system", "fixed"] as const;
export type ClockSource = (typeof CLOCK_SOURCES)[number];

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (raw.trim().length === 0 || !Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

function parseInstantEnv(name: string): Instant | undefined {
  const raw = process.env[name]?.trim();
  if (raw === undefined || raw.length === 0) {
    return undefined;
  }
  try {
    return Instant.parse(raw);
  } catch (error) {
    if (error instanceof AppError) {
      throw invalidConfig(name, "must be an ISO-8601 date-time with an explicit zone");
    }
    throw error;
  }
}

export interface RuntimeConfig {
  host: string;
  port: number;
  clockSource: ClockSource;
  fixedInstant?: Instant;
  utcOffsetMinutes: number;
  logLevel: LogLevel;
  metricsEnabled: boolean;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const clockSource = parseEnumEnv("CLOCK_SOURCE", CLOCK_SOURCES, "system");
  const fixedInstant = parseInstantEnv("CLOCK_FIXED_INSTANT");
  const utcOffsetMinutes = parseIntegerEnv(
    "CLOCK_UTC_OFFSET_MINUTES",
    0,
    MIN_UTC_OFFSET_MINUTES,
    MAX_UTC_OFFSET_MINUTES,
  );
  const logLevel = parseEnumEnv("CLOCK_LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("CLOCK_METRICS_ENABLED", true);

  if (clockSource === "fixed" && !fixedInstant) {
    throw invalidConfig("CLOCK_FIXED_INSTANT", "is required when CLOCK_SOURCE is fixed");
  }
  if (process.env.NODE_ENV === "production" && clockSource === "fixed") {
    throw invalidConfig("CLOCK_SOURCE", "must not be fixed in production");
  }

  return {
    host,
    port,
    clockSource,
    utcOffsetMinutes,
    logLevel,
    metricsEnabled,
    ...(fixedInstant ? { fixedInstant } : {}),
  };
}
