/**
 * Shared schema building blocks
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import { jsonObjectSchema } from "../types/json.js";

/**
 * Icinga sends counters and codes as floats (`200.0`)
 */
export const integerSchema = z.number().transform((value) => Math.round(value));

/**
 * Epoch seconds (number or numeric string) coerced into a Date
 */
export const timestampSchema = z
  .union([z.number(), z.string().regex(/^\d+(\.\d+)?$/).transform(Number)])
  .transform((seconds) => new Date(seconds * 1000));

/**
 * Timestamps where Icinga uses 0 or -1 for "never"
 */
export const optionalTimestampSchema = z
  .union([z.number(), z.null()])
  .optional()
  .transform((seconds) =>
    typeof seconds === "number" && seconds > 0 ? new Date(seconds * 1000) : undefined
  );

/**
 * Convert a Date or epoch seconds into epoch seconds for request bodies.
 *
 * Invalid dates and non-finite numbers raise a `ValidationError` for `field`.
 */
export function toEpochSeconds(value: Date | number, field = "timestamp"): number {
  const seconds = value instanceof Date ? value.getTime() / 1000 : value;
  if (!Number.isFinite(seconds)) {
    throw new ValidationError(`${field} is not a valid time`, { field });
  }
  return seconds;
}

/**
 * `{ "results": [...] }` envelope around any item schema
 */
export function resultsEnvelope<T extends z.ZodTypeAny>(item: T) {
  return z.object({ results: z.array(item) }).transform((envelope) => envelope.results);
}

/**
 * Object envelope returned by `/v1/objects`
 */
export const configObjectSchema = z.object({
  name: z.string(),
  type: z.string(),
  attrs: jsonObjectSchema.default({}),
  joins: z.record(jsonObjectSchema).default({}),
  meta: jsonObjectSchema.default({}),
});

export type ConfigObject = z.output<typeof configObjectSchema>;

export const stringListSchema = z.array(z.string()).default([]);

export const varsSchema = z
  .union([jsonObjectSchema, z.null()])
  .optional()
  .transform((vars) => vars ?? {});

