/**
 * Response Parser
 *
 * Decodes raw response bodies into typed results. Unknown fields are ignored;
 * missing required fields and type mismatches raise a ValidationError naming
 * the offending field.
 */

import type { z } from "zod";
import {
  MalformedResponseError,
  ValidationError,
  mapHttpError,
  type AnyApiError,
} from "./errors.js";
import type { RawResponse } from "./transport/session.js";

/**
 * Parse a JSON body
 */
export function decodeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    const preview = raw.length > 200 ? `${raw.slice(0, 200)}…` : raw;
    throw new MalformedResponseError(`Response is not valid JSON: ${preview}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Validate decoded data against a schema. `status` is the HTTP status of the
 * response the data came from, if any.
 */
export function validate<S extends z.ZodTypeAny>(
  data: unknown,
  schema: S,
  status?: number
): z.output<S> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue.path.join(".");
  throw new ValidationError(
    field ? `Invalid response field "${field}": ${issue.message}` : `Invalid response: ${issue.message}`,
    { field: field || undefined, status }
  );
}

/**
 * Decode a raw body into the given shape
 */
export function parse<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
  status?: number
): z.output<S> {
  return validate(decodeJson(raw), schema, status);
}

/**
 * Check whether a status is a success status
 */
export function isSuccess(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Error bodies are JSON when Icinga produced them and text when a proxy did
 */
function decodeErrorBody(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Turn an error response into a typed error
 */
export function errorFromResponse(response: RawResponse): AnyApiError {
  return mapHttpError(response.status, decodeErrorBody(response.body));
}

/**
 * Decode a response, mapping non-2xx statuses to typed errors
 */
export function decodeResponse<S extends z.ZodTypeAny>(
  response: RawResponse,
  schema: S
): z.output<S> {
  if (!isSuccess(response.status)) {
    throw errorFromResponse(response);
  }
  return parse(response.body, schema, response.status);
}
