/**
 * Host and service states
 *
 * Icinga reports states as numbers (often floats such as `2.0`). Inputs may be
 * given as the enum, the integer code, or the state name.
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";

export enum HostState {
  UP = 0,
  DOWN = 1,
}

export enum ServiceState {
  OK = 0,
  WARNING = 1,
  CRITICAL = 2,
  UNKNOWN = 3,
}

/**
 * Anything accepted where a check exit status is expected
 */
export type StateInput = HostState | ServiceState | number | string;

const HOST_STATE_NAMES = new Map<string, HostState>([
  ["up", HostState.UP],
  ["down", HostState.DOWN],
]);

const SERVICE_STATE_NAMES = new Map<string, ServiceState>([
  ["ok", ServiceState.OK],
  ["warning", ServiceState.WARNING],
  ["critical", ServiceState.CRITICAL],
  ["unknown", ServiceState.UNKNOWN],
]);

/**
 * Convert a state input into the integer code sent to the API.
 *
 * Names are resolved against service states first, then host states.
 */
export function normalizeState(state: StateInput, field = "exit_status"): number {
  if (typeof state === "string") {
    const key = state.trim().toLowerCase();
    const byName = SERVICE_STATE_NAMES.get(key) ?? HOST_STATE_NAMES.get(key);
    if (byName !== undefined) {
      return byName;
    }
    if (/^\d+$/.test(key)) {
      return normalizeState(Number(key), field);
    }
    throw new ValidationError(`Unknown state "${state}"`, { field });
  }

  if (Number.isInteger(state) && state >= 0 && state <= 3) {
    return state;
  }

  throw new ValidationError(`State must be between 0 and 3, got ${state}`, {
    field,
  });
}

/**
 * Remote service state: numeric code coerced into the enum
 */
export const serviceStateSchema = z
  .number()
  .transform((value) => Math.round(value))
  .pipe(z.nativeEnum(ServiceState));

/**
 * Remote host state: numeric code coerced into the enum
 */
export const hostStateSchema = z
  .number()
  .transform((value) => Math.round(value))
  .pipe(z.nativeEnum(HostState));

/**
 * Human-readable state name, e.g. `CRITICAL`
 */
export function serviceStateName(state: ServiceState): string {
  return ServiceState[state];
}

export function hostStateName(state: HostState): string {
  return HostState[state];
}
