/**
 * Event stream models
 *
 * Events arrive as newline-delimited JSON objects tagged by `type`. Known types
 * decode into dedicated variants; anything else becomes a {@link GenericEvent}.
 */

import { z } from "zod";
import { jsonObjectSchema, type JsonObject } from "../types/json.js";
import { HostState, ServiceState, hostStateSchema, serviceStateSchema } from "../types/states.js";
import { validate } from "../parse.js";
import { checkResultSchema, nullableCheckResultSchema, type CheckResult } from "./check-result.js";
import { integerSchema, timestampSchema } from "./common.js";

export const EVENT_STREAM_TYPES = [
  "CheckResult",
  "StateChange",
  "Notification",
  "AcknowledgementSet",
  "AcknowledgementCleared",
  "CommentAdded",
  "CommentRemoved",
  "DowntimeAdded",
  "DowntimeRemoved",
  "DowntimeStarted",
  "DowntimeTriggered",
  "ObjectCreated",
  "ObjectDeleted",
  "ObjectModified",
] as const;

export type EventStreamType = (typeof EVENT_STREAM_TYPES)[number];

export enum NotificationType {
  DowntimeStart = "DowntimeStart",
  DowntimeEnd = "DowntimeEnd",
  DowntimeRemoved = "DowntimeRemoved",
  Custom = "Custom",
  Acknowledgement = "Acknowledgement",
  Problem = "Problem",
  Recovery = "Recovery",
  FlappingStart = "FlappingStart",
  FlappingEnd = "FlappingEnd",
}

/** Bit flags used for notification types in object attributes */
const NOTIFICATION_TYPE_BITS = new Map<number, NotificationType>([
  [1, NotificationType.DowntimeStart],
  [2, NotificationType.DowntimeEnd],
  [4, NotificationType.DowntimeRemoved],
  [8, NotificationType.Custom],
  [16, NotificationType.Acknowledgement],
  [32, NotificationType.Problem],
  [64, NotificationType.Recovery],
  [128, NotificationType.FlappingStart],
  [256, NotificationType.FlappingEnd],
]);

/** Names as written by the event stream, e.g. `DOWNTIMECANCELLED` */
const NOTIFICATION_TYPE_NAMES = new Map<string, NotificationType>([
  ["downtimestart", NotificationType.DowntimeStart],
  ["downtimeend", NotificationType.DowntimeEnd],
  ["downtimeremoved", NotificationType.DowntimeRemoved],
  ["downtimecancelled", NotificationType.DowntimeRemoved],
  ["custom", NotificationType.Custom],
  ["acknowledgement", NotificationType.Acknowledgement],
  ["problem", NotificationType.Problem],
  ["recovery", NotificationType.Recovery],
  ["flappingstart", NotificationType.FlappingStart],
  ["flappingend", NotificationType.FlappingEnd],
]);

/**
 * Notification type given as a name in any casing or as a bit flag
 */
export const notificationTypeSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx): NotificationType => {
    const resolved =
      typeof value === "number"
        ? NOTIFICATION_TYPE_BITS.get(value)
        : NOTIFICATION_TYPE_NAMES.get(value.replace(/[_\s-]/g, "").toLowerCase());
    if (resolved === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown notification type "${value}"`,
      });
      return z.NEVER;
    }
    return resolved;
  });

interface EventBase {
  timestamp: Date;
  host: string;
  service?: string;
}

/**
 * Host events carry a host state, service events a service state
 */
export type ObjectState =
  | { service?: undefined; state: HostState }
  | { service: string; state: ServiceState };

export interface CheckResultEvent extends EventBase {
  type: "CheckResult";
  checkResult: CheckResult;
  downtimeDepth?: number;
  acknowledged?: boolean;
}

export type StateChangeEvent = EventBase &
  ObjectState & {
    type: "StateChange";
    /** 0 = soft, 1 = hard */
    stateType: number;
    checkResult?: CheckResult;
  };

/**
 * A notification sent by Icinga
 */
export interface NotificationEvent extends EventBase {
  type: "Notification";
  command: string;
  users: string[];
  notificationType: NotificationType;
  author: string;
  text: string;
  checkResult?: CheckResult;
}

export type AcknowledgementSetEvent = EventBase &
  ObjectState & {
    type: "AcknowledgementSet";
    stateType: number;
    author: string;
    comment: string;
    acknowledgementType: number;
    notify: boolean;
    expiry?: Date;
  };

export type AcknowledgementClearedEvent = EventBase &
  ObjectState & {
    type: "AcknowledgementCleared";
    stateType: number;
  };

/**
 * Any other event type, kept as JSON
 */
export interface GenericEvent {
  type: string;
  timestamp: Date;
  payload: JsonObject;
}

export type IcingaEvent =
  | CheckResultEvent
  | StateChangeEvent
  | NotificationEvent
  | AcknowledgementSetEvent
  | AcknowledgementClearedEvent
  | GenericEvent;

const base = {
  timestamp: timestampSchema,
  host: z.string(),
  service: z.string().optional(),
};

function objectState(service: string | undefined, code: number): ObjectState | undefined {
  if (service !== undefined) {
    const parsed = serviceStateSchema.safeParse(code);
    return parsed.success ? { service, state: parsed.data } : undefined;
  }
  const parsed = hostStateSchema.safeParse(code);
  return parsed.success ? { state: parsed.data } : undefined;
}

/**
 * Decode `state` against the host or service states, depending on `service`
 */
function withObjectState(
  raw: { service?: string; state: number },
  ctx: z.RefinementCtx
): ObjectState {
  const resolved = objectState(raw.service, raw.state);
  if (!resolved) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["state"],
      message: `Invalid ${raw.service === undefined ? "host" : "service"} state ${raw.state}`,
    });
    return z.NEVER;
  }
  return resolved;
}

const checkResultEventSchema = z
  .object({
    ...base,
    check_result: checkResultSchema,
    downtime_depth: integerSchema.optional(),
    acknowledgement: z.boolean().optional(),
  })
  .transform(
    (raw): CheckResultEvent => ({
      type: "CheckResult",
      timestamp: raw.timestamp,
      host: raw.host,
      service: raw.service,
      checkResult: raw.check_result,
      downtimeDepth: raw.downtime_depth,
      acknowledged: raw.acknowledgement,
    })
  );

const stateChangeEventSchema = z
  .object({
    ...base,
    state: z.number(),
    state_type: integerSchema,
    check_result: nullableCheckResultSchema,
  })
  .transform(
    (raw, ctx): StateChangeEvent => ({
      type: "StateChange",
      timestamp: raw.timestamp,
      host: raw.host,
      ...withObjectState(raw, ctx),
      stateType: raw.state_type,
      checkResult: raw.check_result,
    })
  );

const notificationEventSchema = z
  .object({
    ...base,
    command: z.string(),
    users: z.array(z.string()).default([]),
    notification_type: notificationTypeSchema,
    author: z.string().default(""),
    text: z.string().default(""),
    check_result: nullableCheckResultSchema,
  })
  .transform(
    (raw): NotificationEvent => ({
      type: "Notification",
      timestamp: raw.timestamp,
      host: raw.host,
      service: raw.service,
      command: raw.command,
      users: raw.users,
      notificationType: raw.notification_type,
      author: raw.author,
      text: raw.text,
      checkResult: raw.check_result,
    })
  );

const acknowledgementSetEventSchema = z
  .object({
    ...base,
    state: z.number(),
    state_type: integerSchema,
    author: z.string(),
    comment: z.string(),
    acknowledgement_type: integerSchema,
    notify: z.boolean().default(false),
    expiry: z.number().optional(),
  })
  .transform(
    (raw, ctx): AcknowledgementSetEvent => ({
      type: "AcknowledgementSet",
      timestamp: raw.timestamp,
      host: raw.host,
      ...withObjectState(raw, ctx),
      stateType: raw.state_type,
      author: raw.author,
      comment: raw.comment,
      acknowledgementType: raw.acknowledgement_type,
      notify: raw.notify,
      expiry: raw.expiry && raw.expiry > 0 ? new Date(raw.expiry * 1000) : undefined,
    })
  );

const acknowledgementClearedEventSchema = z
  .object({
    ...base,
    state: z.number(),
    state_type: integerSchema,
  })
  .transform(
    (raw, ctx): AcknowledgementClearedEvent => ({
      type: "AcknowledgementCleared",
      timestamp: raw.timestamp,
      host: raw.host,
      ...withObjectState(raw, ctx),
      stateType: raw.state_type,
    })
  );

const genericEventSchema = z
  .object({ type: z.string(), timestamp: timestampSchema })
  .passthrough()
  .transform((raw): GenericEvent => {
    const { type, timestamp, ...rest } = raw;
    return { type, timestamp, payload: validate(rest, jsonObjectSchema) };
  });

const EVENT_SCHEMAS = new Map<string, z.ZodType<IcingaEvent, z.ZodTypeDef, unknown>>([
  ["CheckResult", checkResultEventSchema],
  ["StateChange", stateChangeEventSchema],
  ["Notification", notificationEventSchema],
  ["AcknowledgementSet", acknowledgementSetEventSchema],
  ["AcknowledgementCleared", acknowledgementClearedEventSchema],
]);

/**
 * Decode one event object
 */
export function parseEvent(data: unknown): IcingaEvent {
  const { type } = validate(data, z.object({ type: z.string() }));
  return validate(data, EVENT_SCHEMAS.get(type) ?? genericEventSchema);
}
