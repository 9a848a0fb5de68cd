/**
 * API Errors
 *
 * Every failure surfaced by the client is one of five kinds. The mapping from
 * HTTP status and response body to a kind lives in {@link mapHttpError}.
 */

export type ApiErrorKind =
  | "authentication"
  | "not_found"
  | "validation"
  | "transport"
  | "malformed_response";

export interface ApiErrorOptions {
  /** HTTP status code, when a response was received */
  status?: number;
  /** Message reported by the Icinga API */
  remoteMessage?: string;
  /** Detailed error lines reported by the Icinga API */
  remoteErrors?: string[];
  cause?: Error;
}

/**
 * Base class of all client errors
 */
export abstract class ApiError extends Error {
  abstract readonly kind: ApiErrorKind;
  readonly status?: number;
  readonly remoteMessage?: string;
  readonly remoteErrors: string[];
  readonly cause?: Error;

  constructor(message: string, options: ApiErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.status = options.status;
    this.remoteMessage = options.remoteMessage;
    this.remoteErrors = options.remoteErrors ?? [];
    this.cause = options.cause;
  }
}

/**
 * Credentials were rejected (401) or lack the permission (403)
 */
export class AuthenticationError extends ApiError {
  readonly kind = "authentication" as const;
}

/**
 * The referenced object does not exist
 */
export class NotFoundError extends ApiError {
  readonly kind = "not_found" as const;
}

export interface ValidationErrorOptions extends ApiErrorOptions {
  /** Offending field, e.g. `host` or `results.0.attrs.state` */
  field?: string;
}

/**
 * Local input or remote schema violation
 */
export class ValidationError extends ApiError {
  readonly kind = "validation" as const;
  readonly field?: string;

  constructor(message: string, options: ValidationErrorOptions = {}) {
    super(message, options);
    this.field = options.field;
  }
}

/**
 * Connection, TLS or timeout failure. Never retried.
 */
export class TransportError extends ApiError {
  readonly kind = "transport" as const;
}

/**
 * The response body could not be decoded
 */
export class MalformedResponseError extends ApiError {
  readonly kind = "malformed_response" as const;
}

export type AnyApiError =
  | AuthenticationError
  | NotFoundError
  | ValidationError
  | TransportError
  | MalformedResponseError;

export function isApiError(error: unknown): error is AnyApiError {
  return error instanceof ApiError;
}

/**
 * Error details extracted from an Icinga error body
 */
export interface RemoteErrorDetails {
  message?: string;
  errors: string[];
}

/**
 * Pull the remote message out of either error envelope:
 * `{ "error": 404, "status": "No objects found." }` or
 * `{ "results": [{ "code": 500, "status": "...", "errors": [...] }] }`.
 */
export function extractRemoteError(body: unknown): RemoteErrorDetails {
  if (typeof body !== "object" || body === null) {
    return { errors: [] };
  }

  const errors: string[] = [];
  let message: string | undefined;

  if ("status" in body && typeof body.status === "string") {
    message = body.status;
  }

  if ("results" in body && Array.isArray(body.results)) {
    for (const result of body.results) {
      if (typeof result !== "object" || result === null) continue;
      if (
        "code" in result &&
        typeof result.code === "number" &&
        result.code >= 200 &&
        result.code <= 299
      ) {
        continue;
      }
      if (message === undefined && "status" in result && typeof result.status === "string") {
        message = result.status;
      }
      if ("errors" in result && Array.isArray(result.errors)) {
        for (const line of result.errors) {
          if (typeof line === "string") errors.push(line.trim());
        }
      }
    }
  }

  return { message, errors };
}

/**
 * Translate a non-2xx response into a typed error.
 *
 * @param status - HTTP status code
 * @param body - Parsed JSON body, or the raw text when it did not parse
 */
export function mapHttpError(status: number, body: unknown): AnyApiError {
  const remote =
    typeof body === "string" ? { message: undefined, errors: [] } : extractRemoteError(body);
  const rawText = typeof body === "string" ? body.trim() : "";
  const detail = remote.message ?? (rawText || `HTTP ${status}`);
  const message =
    remote.errors.length > 0 ? `${detail}: ${remote.errors.join("; ")}` : detail;

  const options: ApiErrorOptions = {
    status,
    remoteMessage: remote.message ?? (rawText || undefined),
    remoteErrors: remote.errors,
  };

  if (status === 401 || status === 403) {
    return new AuthenticationError(message, options);
  }
  if (status === 404) {
    return new NotFoundError(message, options);
  }
  if ((status >= 400 && status < 500) || status === 500) {
    return new ValidationError(message, options);
  }
  return new TransportError(message, options);
}
