/**
 * Transport Session
 *
 * Holds connection configuration and executes raw HTTP requests against the
 * Icinga 2 API. Interprets nothing beyond transport failures: the HTTP status
 * and body are handed back to the caller untouched.
 */

import { readFileSync } from "node:fs";
import { Agent } from "node:https";
import type { Readable } from "node:stream";
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import type { ClientConfig } from "../config.js";
import { TransportError, ValidationError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { JsonObject } from "../types/json.js";

export const CLIENT_VERSION = "0.1.0";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * A request as produced by the request builders
 */
export interface ApiRequest {
  method: HttpMethod;
  /** Path below `/v1/`, e.g. `objects/hosts/web01` */
  path: string;
  query?: Record<string, string | string[]>;
  body?: JsonObject;
}

/**
 * Raw outcome of a request
 */
export interface RawResponse {
  status: number;
  body: string;
}

export interface StreamResponse {
  status: number;
  stream: Readable;
}

export interface SessionOptions {
  /** Replace the HTTP adapter, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

/**
 * Build the `Authorization` header for basic auth
 */
export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

/**
 * Encode a name for use as a path segment (`!` and spaces included)
 */
export function encodeName(name: string): string {
  return encodeURIComponent(name).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function readPem(path: string, field: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new ValidationError(`Cannot read ${field} file ${path}`, {
      field,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Build the HTTPS agent carrying the TLS trust policy and client certificate.
 *
 * A certificate file without a separate key is expected to contain both.
 */
function createAgent(config: ClientConfig): Agent {
  const cert = config.certificate ? readPem(config.certificate, "certificate") : undefined;
  const key = config.key ? readPem(config.key, "key") : cert;

  return new Agent({
    cert,
    key: cert ? key : undefined,
    ca: config.caCertificate ? readPem(config.caCertificate, "caCertificate") : undefined,
    rejectUnauthorized: !config.insecure,
    keepAlive: true,
  });
}

/**
 * Transport session bound to one API endpoint
 */
export class TransportSession {
  readonly baseUrl: string;
  readonly timeout: number;
  /** TLS trust policy and client certificate for every connection */
  readonly agent: Agent;
  private http: AxiosInstance;
  private log: Logger;
  private authorization?: string;

  constructor(config: ClientConfig, options: SessionOptions = {}) {
    this.baseUrl = config.url.replace(/\/+$/, "");
    this.timeout = config.timeout;
    this.log = createLogger({ component: "transport", baseUrl: this.baseUrl }, options.logger);

    // client certificates take precedence over basic auth
    if (!config.certificate && config.username && config.password) {
      this.authorization = basicAuthHeader(config.username, config.password);
    }

    this.agent = createAgent(config);
    this.http = axios.create({
      baseURL: `${this.baseUrl}/v1/`,
      timeout: this.timeout,
      httpsAgent: this.agent,
      adapter: options.adapter,
      validateStatus: () => true,
      transformResponse: [(data: unknown) => data],
    });
  }

  private headers(method: HttpMethod): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      "User-Agent": `icinga-api-client/${CLIENT_VERSION}`,
      "X-HTTP-Method-Override": method,
    };
    if (this.authorization) {
      headers.Authorization = this.authorization;
    }
    return headers;
  }

  /**
   * Execute a request and return status and raw body.
   *
   * Every request travels as POST with `X-HTTP-Method-Override`, which lets
   * GET and DELETE requests carry a JSON body.
   */
  async execute(request: ApiRequest): Promise<RawResponse> {
    const response = await this.send(request, "text");
    const body = typeof response.data === "string" ? response.data : "";
    return { status: response.status, body };
  }

  /**
   * Execute a request and return the response body as a stream
   */
  async stream(request: ApiRequest): Promise<StreamResponse> {
    const response = await this.send(request, "stream");
    const stream: unknown = response.data;
    if (!isReadable(stream)) {
      throw new TransportError(`Expected a streaming response for ${request.path}`);
    }
    return { status: response.status, stream };
  }

  private async send(
    request: ApiRequest,
    responseType: "text" | "stream"
  ): Promise<AxiosResponse<unknown>> {
    const startTime = Date.now();
    const url = request.path.replace(/^\/+/, "");

    try {
      const response = await this.http.request<unknown>({
        method: "POST",
        url,
        params: request.query,
        paramsSerializer: { indexes: null },
        data: request.body === undefined ? undefined : JSON.stringify(request.body),
        headers: this.headers(request.method),
        responseType,
      });

      this.log.debug(
        {
          method: request.method,
          path: url,
          status: response.status,
          durationMs: Date.now() - startTime,
        },
        "request completed"
      );
      return response;
    } catch (error) {
      const transportError = toTransportError(error, this.timeout);
      this.log.warn(
        { method: request.method, path: url, err: transportError.message },
        "request failed"
      );
      throw transportError;
    }
  }
}

function isReadable(value: unknown): value is Readable {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncIterator in value &&
    "pipe" in value
  );
}

/**
 * Convert a failed request into a TransportError
 */
export function toTransportError(error: unknown, timeout: number): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return new TransportError(`Request timed out after ${timeout}ms`, { cause: error });
    }
    return new TransportError(`Network error: ${error.message}`, { cause: error });
  }

  if (error instanceof Error) {
    return new TransportError(`Network error: ${error.message}`, { cause: error });
  }

  return new TransportError("Network error: Unknown error");
}
