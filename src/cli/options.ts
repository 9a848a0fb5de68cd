/**
 * Option value parsers shared by the CLI commands
 */

import { InvalidArgumentError } from "commander";
import { jsonValueSchema, type JsonObject, type JsonValue } from "../types/json.js";

/**
 * Parse a positive integer option
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Collect a repeatable option into a list
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Count repeated flags such as `-ddd`
 */
export function increase(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Value of `key=value`: JSON where it parses (`true`, `42`, `["a"]`), a string otherwise
 */
export function parseValue(raw: string): JsonValue {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return raw;
  }
  const parsed = jsonValueSchema.safeParse(decoded);
  return parsed.success ? parsed.data : raw;
}

/**
 * Collect repeatable `key=value` options into an object
 */
export function collectAssignment(assignment: string, previous: JsonObject = {}): JsonObject {
  const separator = assignment.indexOf("=");
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${assignment}".`);
  }
  const key = assignment.slice(0, separator).trim();
  return { ...previous, [key]: parseValue(assignment.slice(separator + 1)) };
}

/**
 * Parse a timestamp given as epoch seconds or an ISO 8601 date
 */
export function parseTimestamp(value: string): Date | number {
  if (/^\d+(\.\d+)?$/.test(value)) {
    return Number(value);
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError("Must be epoch seconds or an ISO 8601 date.");
  }
  return date;
}

/**
 * Split a comma separated list, dropping empty entries
 */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
