/**
 * In-process HTTP stand-in for client tests
 */

import { Readable } from "node:stream";
import type { AxiosAdapter } from "axios";
import pino from "pino";
import { IcingaClient, type IcingaClientOptions } from "../client.js";

export interface RecordedRequest {
  method?: string;
  url?: string;
  baseURL?: string;
  params?: unknown;
  headers: Record<string, string>;
  body: unknown;
}

export interface StubResponse {
  status?: number;
  /** Objects are sent as JSON; strings and streams as they are */
  body: unknown;
}

export const silentLogger = pino({ level: "silent" });

/**
 * Adapter answering with the given responses in order; the last one repeats
 */
export function createStubAdapter(...responses: StubResponse[]): {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(config.headers.toJSON())) {
      if (typeof value === "string") headers[name.toLowerCase()] = value;
    }

    requests.push({
      method: config.method,
      url: config.url,
      baseURL: config.baseURL,
      params: config.params,
      headers,
      body: typeof config.data === "string" ? JSON.parse(config.data) : undefined,
    });

    const next = responses[Math.min(requests.length, responses.length) - 1];
    const status = next.status ?? 200;
    const data =
      typeof next.body === "string" || next.body instanceof Readable
        ? next.body
        : JSON.stringify(next.body);

    return { data, status, statusText: String(status), headers: {}, config };
  };

  return { adapter, requests };
}

/**
 * Client with basic auth wired to a stub adapter
 */
export function createTestClient(
  responses: StubResponse[],
  options: IcingaClientOptions = {}
): { client: IcingaClient; requests: RecordedRequest[] } {
  const { adapter, requests } = createStubAdapter(...responses);
  const client = new IcingaClient({
    url: "https://icinga.test:5665",
    username: "root",
    password: "test-secret",
    logger: silentLogger,
    adapter,
    ...options,
  });
  return { client, requests };
}

/**
 * Newline-delimited JSON stream
 */
export function ndjson(...events: object[]): Readable {
  return Readable.from(events.map((event) => `${JSON.stringify(event)}\n`));
}
