import { assertUtcOffsetMinutes } from "../domain/instant.js";
import { AppError } from "../infra/app-error.js";

const SIGNED_INTEGER_PATTERN = /^[+-]?\d{1,4}$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function readQueryParam(query: unknown, name: string): unknown {
  if (!isObject(query)) {
    return undefined;
  }
  return query[name];
}

export function normalizeUtcOffsetMinutes(value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new AppError(422, "invalid_utc_offset", "utc_offset_minutes must be a string.");
  }

  const normalized = value.trim();
  if (!SIGNED_INTEGER_PATTERN.test(normalized)) {
    throw new AppError(422, "invalid_utc_offset", "utc_offset_minutes must be an integer.");
  }
  const parsed = Number(normalized);
  assertUtcOffsetMinutes(parsed);
  return parsed;
}
