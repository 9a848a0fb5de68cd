/**
 * Event stream subscription
 *
 * `/v1/events` keeps the connection open and writes one JSON object per line.
 */

import type { Readable } from "node:stream";
import { ValidationError } from "../errors.js";
import { parseEvent, type EventStreamType, type IcingaEvent } from "../models/events.js";
import { decodeJson } from "../parse.js";
import type { ApiRequest } from "../transport/session.js";
import type { JsonObject } from "../types/json.js";

export interface SubscribeOptions {
  types: EventStreamType[];
  /** Queue name; clients sharing a queue must use the same types and filter */
  queue: string;
  filter?: string;
  filterVars?: JsonObject;
}

export function buildSubscribe(options: SubscribeOptions): ApiRequest {
  if (options.types.length === 0) {
    throw new ValidationError("At least one event type is required", { field: "types" });
  }
  if (!options.queue.trim()) {
    throw new ValidationError("queue is required", { field: "queue" });
  }

  const body: JsonObject = { types: options.types, queue: options.queue };
  if (options.filter) body.filter = options.filter;
  if (options.filterVars && Object.keys(options.filterVars).length > 0) {
    body.filter_vars = options.filterVars;
  }

  return { method: "POST", path: "events", body };
}

/**
 * Split a byte stream into lines
 */
export async function* readLines(stream: Readable): AsyncGenerator<string> {
  // shared across chunks: a multibyte character may span two of them
  const decoder = new TextDecoder();
  let buffer = "";
  for await (const chunk of stream) {
    buffer += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    let newline = buffer.indexOf("\n");
    while (newline !== -1) {
      const line = buffer.slice(0, newline).trim();
      buffer = buffer.slice(newline + 1);
      if (line) yield line;
      newline = buffer.indexOf("\n");
    }
  }
  buffer += decoder.decode();
  const rest = buffer.trim();
  if (rest) yield rest;
}

/**
 * Decode a stream of newline-delimited events
 */
export async function* decodeEvents(stream: Readable): AsyncGenerator<IcingaEvent> {
  for await (const line of readLines(stream)) {
    yield parseEvent(decodeJson(line));
  }
}

/**
 * Collect a stream into a string, used for error bodies
 */
export async function readAll(stream: Readable): Promise<string> {
  let text = "";
  for await (const line of readLines(stream)) {
    text += `${line}\n`;
  }
  return text.trim();
}
