/**
 * Request builders for `/v1/actions`
 *
 * Each builder validates its input locally and produces the exact body the
 * Icinga action expects. Hosts and services given by name are turned into a
 * filter with `filter_vars`, so names never need quoting.
 */

import { ValidationError } from "../errors.js";
import { toEpochSeconds } from "../models/common.js";
import type { ApiRequest } from "../transport/session.js";
import type { JsonObject } from "../types/json.js";
import type { HostOrService } from "../types/object-types.js";
import { normalizeState, type StateInput } from "../types/states.js";

/**
 * A host, or a service of a host
 */
export interface ObjectReference {
  host: string;
  service?: string;
}

/**
 * All hosts or services matching a filter expression
 */
export interface FilterTarget {
  type: HostOrService;
  filter: string;
  filterVars?: JsonObject;
}

export type ActionTarget = ObjectReference | FilterTarget;

export type Timestamp = Date | number;

interface Selector {
  type: HostOrService;
  filter: string;
  filter_vars?: JsonObject;
}

function requireText(value: string | undefined, field: string): string {
  if (value === undefined || !value.trim()) {
    throw new ValidationError(`${field} is required`, { field });
  }
  return value;
}

function isFilterTarget(target: ActionTarget): target is FilterTarget {
  return "filter" in target;
}

/**
 * Validate an object reference; a service reference needs both names
 */
export function validateReference(reference: ObjectReference): ObjectReference {
  const host = requireText(reference.host, "host");
  if (reference.service !== undefined) {
    return { host, service: requireText(reference.service, "service") };
  }
  return { host };
}

/**
 * Full Icinga name of a reference: `host` or `host!service`
 */
export function referenceName(reference: ObjectReference): string {
  const { host, service } = validateReference(reference);
  return service ? `${host}!${service}` : host;
}

/**
 * Turn a target into `type`, `filter` and `filter_vars`
 */
export function toSelector(target: ActionTarget): Selector {
  if (isFilterTarget(target)) {
    const selector: Selector = {
      type: target.type,
      filter: requireText(target.filter, "filter"),
    };
    if (target.filterVars && Object.keys(target.filterVars).length > 0) {
      selector.filter_vars = target.filterVars;
    }
    return selector;
  }

  const { host, service } = validateReference(target);
  if (service === undefined) {
    return {
      type: "Host",
      filter: "host.name==host_name",
      filter_vars: { host_name: host },
    };
  }
  return {
    type: "Service",
    filter: "host.name==host_name && service.name==service_name",
    filter_vars: { host_name: host, service_name: service },
  };
}

function action(name: string, body?: JsonObject): ApiRequest {
  return { method: "POST", path: `actions/${name}`, body };
}

function selectorBody(target: ActionTarget): JsonObject {
  const { type, filter, filter_vars } = toSelector(target);
  const body: JsonObject = { type, filter };
  if (filter_vars) body.filter_vars = filter_vars;
  return body;
}

export interface ProcessCheckResultInput {
  target: ActionTarget;
  /** Services: 0=OK 1=WARNING 2=CRITICAL 3=UNKNOWN; hosts: 0=UP 1=DOWN */
  exitStatus: StateInput;
  /** Plugin output without performance data */
  pluginOutput: string;
  performanceData?: string[] | string;
  /** Command path followed by its arguments, or a single string */
  checkCommand?: string[] | string;
  /** Usually the name of the command endpoint */
  checkSource?: string;
  executionStart?: Timestamp;
  executionEnd?: Timestamp;
  /** Seconds until the next check result is expected */
  ttl?: number;
}

/**
 * Submit a passive check result.
 *
 * Objects given by reference are addressed by name (`host` or `service`
 * key); filter targets use `filter`.
 */
export function buildProcessCheckResult(input: ProcessCheckResultInput): ApiRequest {
  const body: JsonObject = {};

  if (isFilterTarget(input.target)) {
    Object.assign(body, selectorBody(input.target));
  } else {
    const reference = validateReference(input.target);
    const type: HostOrService = reference.service === undefined ? "Host" : "Service";
    body.type = type;
    body[type.toLowerCase()] = referenceName(reference);
  }

  body.exit_status = normalizeState(input.exitStatus);
  body.plugin_output = input.pluginOutput;

  if (input.performanceData !== undefined && input.performanceData.length > 0) {
    body.performance_data = input.performanceData;
  }
  if (input.checkCommand !== undefined && input.checkCommand.length > 0) {
    body.check_command = input.checkCommand;
  }
  if (input.checkSource) body.check_source = input.checkSource;
  if (input.executionStart !== undefined) {
    body.execution_start = toEpochSeconds(input.executionStart, "executionStart");
  }
  if (input.executionEnd !== undefined) {
    body.execution_end = toEpochSeconds(input.executionEnd, "executionEnd");
  }
  if (input.ttl !== undefined) {
    if (input.ttl <= 0) {
      throw new ValidationError("ttl must be positive", { field: "ttl" });
    }
    body.ttl = input.ttl;
  }

  return action("process-check-result", body);
}

export interface RescheduleCheckInput {
  target: ActionTarget;
  nextCheck?: Timestamp;
  /** Ignore period restrictions and disabled checks (default true) */
  force?: boolean;
}

export function buildRescheduleCheck(input: RescheduleCheckInput): ApiRequest {
  const body = selectorBody(input.target);
  body.force = input.force ?? true;
  if (input.nextCheck !== undefined) body.next_check = toEpochSeconds(input.nextCheck, "nextCheck");
  return action("reschedule-check", body);
}

export interface SendCustomNotificationInput {
  target: ActionTarget;
  author: string;
  comment: string;
  /** Ignore downtimes and notification settings */
  force?: boolean;
}

/**
 * Send a custom notification
 */
export function buildSendCustomNotification(input: SendCustomNotificationInput): ApiRequest {
  const body = selectorBody(input.target);
  body.author = requireText(input.author, "author");
  body.comment = requireText(input.comment, "comment");
  if (input.force !== undefined) body.force = input.force;
  return action("send-custom-notification", body);
}

export interface DelayNotificationInput {
  target: ActionTarget;
  /** Delay notifications until this time */
  timestamp: Timestamp;
}

export function buildDelayNotification(input: DelayNotificationInput): ApiRequest {
  const body = selectorBody(input.target);
  body.timestamp = toEpochSeconds(input.timestamp, "timestamp");
  return action("delay-notification", body);
}

export interface AcknowledgeProblemInput {
  target: ActionTarget;
  author: string;
  comment: string;
  /** The acknowledgement is removed at this time */
  expiry?: Timestamp;
  /** Keep the acknowledgement until the object fully recovers */
  sticky?: boolean;
  notify?: boolean;
  /** Keep the comment after the acknowledgement is removed */
  persistent?: boolean;
}

/**
 * Acknowledge a host or service problem
 */
export function buildAcknowledgeProblem(input: AcknowledgeProblemInput): ApiRequest {
  const body = selectorBody(input.target);
  body.author = requireText(input.author, "author");
  body.comment = requireText(input.comment, "comment");
  if (input.expiry !== undefined) body.expiry = toEpochSeconds(input.expiry, "expiry");
  if (input.sticky !== undefined) body.sticky = input.sticky;
  if (input.notify !== undefined) body.notify = input.notify;
  if (input.persistent !== undefined) body.persistent = input.persistent;
  return action("acknowledge-problem", body);
}

export interface RemoveAcknowledgementInput {
  target: ActionTarget;
  /** Name of the user removing the acknowledgement */
  author?: string;
}

export function buildRemoveAcknowledgement(input: RemoveAcknowledgementInput): ApiRequest {
  const body = selectorBody(input.target);
  if (input.author) body.author = input.author;
  return action("remove-acknowledgement", body);
}

export interface AddCommentInput {
  target: ActionTarget;
  author: string;
  comment: string;
  expiry?: Timestamp;
}

export function buildAddComment(input: AddCommentInput): ApiRequest {
  const body = selectorBody(input.target);
  body.author = requireText(input.author, "author");
  body.comment = requireText(input.comment, "comment");
  if (input.expiry !== undefined) body.expiry = toEpochSeconds(input.expiry, "expiry");
  return action("add-comment", body);
}

/**
 * Remove by the comment/downtime name, or by a host/service target
 */
export type RemovalTarget = { name: string } | ActionTarget;

function removalBody(kind: "Comment" | "Downtime", target: RemovalTarget): JsonObject {
  if ("name" in target) {
    return { type: kind, [kind.toLowerCase()]: requireText(target.name, "name") };
  }
  return selectorBody(target);
}

export function buildRemoveComment(target: RemovalTarget, author?: string): ApiRequest {
  const body = removalBody("Comment", target);
  if (author) body.author = author;
  return action("remove-comment", body);
}

export interface ScheduleDowntimeInput {
  target: ActionTarget;
  author: string;
  comment: string;
  startTime: Timestamp;
  endTime: Timestamp;
  /** Fixed downtimes cover exactly start to end (default true) */
  fixed?: boolean;
  /** Length in seconds of a flexible downtime once triggered */
  duration?: number;
  /** Also schedule downtimes for all services of matched hosts */
  allServices?: boolean;
  /** Name of the downtime that triggers this one */
  triggerName?: string;
  /** `DowntimeNoChildren`, `DowntimeTriggeredChildren` or `DowntimeNonTriggeredChildren` */
  childOptions?: "DowntimeNoChildren" | "DowntimeTriggeredChildren" | "DowntimeNonTriggeredChildren";
}

/**
 * Schedule a downtime
 */
export function buildScheduleDowntime(input: ScheduleDowntimeInput): ApiRequest {
  const body = selectorBody(input.target);
  body.author = requireText(input.author, "author");
  body.comment = requireText(input.comment, "comment");

  const start = toEpochSeconds(input.startTime, "startTime");
  const end = toEpochSeconds(input.endTime, "endTime");
  if (end <= start) {
    throw new ValidationError("endTime must be after startTime", { field: "endTime" });
  }
  body.start_time = start;
  body.end_time = end;

  if (input.fixed !== undefined) body.fixed = input.fixed;
  if (input.fixed === false && input.duration === undefined) {
    throw new ValidationError("Flexible downtimes require a duration", { field: "duration" });
  }
  if (input.duration !== undefined) body.duration = input.duration;
  if (input.allServices !== undefined) body.all_services = input.allServices;
  if (input.triggerName) body.trigger_name = input.triggerName;
  if (input.childOptions) body.child_options = input.childOptions;

  return action("schedule-downtime", body);
}

export function buildRemoveDowntime(target: RemovalTarget, author?: string): ApiRequest {
  const body = removalBody("Downtime", target);
  if (author) body.author = author;
  return action("remove-downtime", body);
}

export function buildShutdownProcess(): ApiRequest {
  return action("shutdown-process");
}

export function buildRestartProcess(): ApiRequest {
  return action("restart-process");
}

/**
 * Generate a PKI ticket for CSR auto-signing
 */
export function buildGenerateTicket(cn: string): ApiRequest {
  return action("generate-ticket", { cn: requireText(cn, "cn") });
}
