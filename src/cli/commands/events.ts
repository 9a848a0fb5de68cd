/**
 * Events Command
 *
 * Streams events until the server closes the connection or `--limit` events
 * have been printed.
 */

import pc from "picocolors";
import type { IcingaClient } from "../../client.js";
import { EVENT_STREAM_TYPES, type EventStreamType, type IcingaEvent } from "../../models/events.js";
import { ValidationError } from "../../errors.js";
import { formatHostState, formatState, type OutputFormat } from "../reporter.js";

export interface EventsCommandOptions {
  type: string[];
  queue: string;
  filter?: string;
  limit?: number;
}

/**
 * Resolve event type names case-insensitively
 */
export function parseEventTypes(names: string[]): EventStreamType[] {
  return names.map((name) => {
    const type = EVENT_STREAM_TYPES.find((candidate) => candidate.toLowerCase() === name.toLowerCase());
    if (!type) {
      throw new ValidationError(
        `Unknown event type "${name}" (expected one of ${EVENT_STREAM_TYPES.join(", ")})`,
        { field: "types" }
      );
    }
    return type;
  });
}

function objectName(event: IcingaEvent): string {
  if (!("host" in event)) return "";
  return event.service ? `${event.host}!${event.service}` : event.host;
}

function summary(event: IcingaEvent): string {
  if ("notificationType" in event) return `${event.notificationType} ${event.text}`.trim();
  if ("comment" in event) return `${event.author}: ${event.comment}`;
  if ("state" in event) {
    return event.service === undefined ? formatHostState(event.state) : formatState(event.state);
  }
  if ("checkResult" in event && event.checkResult) {
    return `${formatState(event.checkResult.state)} ${event.checkResult.output}`;
  }
  return "";
}

/**
 * One line per event
 */
export function formatEvent(event: IcingaEvent, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(event);
  }
  return [pc.dim(event.timestamp.toISOString()), pc.bold(event.type), objectName(event), summary(event)]
    .filter((part) => part.length > 0)
    .join("  ");
}

/**
 * `events --type <type> --queue <name>`
 */
export async function runEvents(
  client: IcingaClient,
  format: OutputFormat,
  options: EventsCommandOptions
): Promise<number> {
  const events = client.events.subscribe({
    types: parseEventTypes(options.type),
    queue: options.queue,
    filter: options.filter,
  });

  let received = 0;
  for await (const event of events) {
    console.log(formatEvent(event, format));
    received += 1;
    if (options.limit !== undefined && received >= options.limit) {
      break;
    }
  }
  return received;
}
