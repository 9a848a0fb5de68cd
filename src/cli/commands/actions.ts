/**
 * Action Commands
 *
 * Check results, notifications, acknowledgements, comments and downtimes for
 * a host (`--host`) or one of its services (`--host` and `--service`).
 */

import type { IcingaClient } from "../../client.js";
import type { ObjectReference, Timestamp } from "../../endpoints/actions.js";
import type { ActionResult } from "../../models/results.js";
import { actionResultTable, printResult, type OutputFormat } from "../reporter.js";

export interface TargetOptions {
  host?: string;
  service?: string;
}

/**
 * Reference from `--host`/`--service`; a missing host is rejected by the builders
 */
export function targetFrom(options: TargetOptions): ObjectReference {
  return { host: options.host ?? "", service: options.service };
}

function report(format: OutputFormat, results: ActionResult[]): ActionResult[] {
  printResult(format, results, actionResultTable);
  return results;
}

export interface CheckResultCommandOptions extends TargetOptions {
  exitStatus: string;
  output: string;
  perfdata?: string[];
  checkSource?: string;
  ttl?: number;
}

export async function runCheckResult(
  client: IcingaClient,
  format: OutputFormat,
  options: CheckResultCommandOptions
): Promise<ActionResult[]> {
  const results = await client.actions.processCheckResult({
    target: targetFrom(options),
    exitStatus: options.exitStatus,
    pluginOutput: options.output,
    performanceData: options.perfdata,
    checkSource: options.checkSource,
    ttl: options.ttl,
  });
  return report(format, results);
}

export interface NotifyCommandOptions extends TargetOptions {
  author: string;
  comment: string;
  force?: boolean;
}

export async function runNotify(
  client: IcingaClient,
  format: OutputFormat,
  options: NotifyCommandOptions
): Promise<ActionResult[]> {
  const results = await client.actions.sendCustomNotification({
    target: targetFrom(options),
    author: options.author,
    comment: options.comment,
    force: options.force,
  });
  return report(format, results);
}

export interface AcknowledgeCommandOptions extends TargetOptions {
  author: string;
  comment: string;
  expiry?: Timestamp;
  sticky?: boolean;
  notify?: boolean;
  persistent?: boolean;
}

export async function runAcknowledge(
  client: IcingaClient,
  format: OutputFormat,
  options: AcknowledgeCommandOptions
): Promise<ActionResult[]> {
  const results = await client.actions.acknowledgeProblem({
    target: targetFrom(options),
    author: options.author,
    comment: options.comment,
    expiry: options.expiry,
    sticky: options.sticky,
    notify: options.notify,
    persistent: options.persistent,
  });
  return report(format, results);
}

export interface RemoveAcknowledgementCommandOptions extends TargetOptions {
  author?: string;
}

export async function runRemoveAcknowledgement(
  client: IcingaClient,
  format: OutputFormat,
  options: RemoveAcknowledgementCommandOptions
): Promise<ActionResult[]> {
  const results = await client.actions.removeAcknowledgement({
    target: targetFrom(options),
    author: options.author,
  });
  return report(format, results);
}

export interface CommentCommandOptions extends TargetOptions {
  author: string;
  comment: string;
  expiry?: Timestamp;
}

export async function runComment(
  client: IcingaClient,
  format: OutputFormat,
  options: CommentCommandOptions
): Promise<ActionResult[]> {
  const results = await client.actions.addComment({
    target: targetFrom(options),
    author: options.author,
    comment: options.comment,
    expiry: options.expiry,
  });
  return report(format, results);
}

export interface DowntimeCommandOptions extends TargetOptions {
  author: string;
  comment: string;
  start: Timestamp;
  end: Timestamp;
  duration?: number;
  flexible?: boolean;
  allServices?: boolean;
}

export async function runDowntime(
  client: IcingaClient,
  format: OutputFormat,
  options: DowntimeCommandOptions
): Promise<ActionResult[]> {
  const results = await client.actions.scheduleDowntime({
    target: targetFrom(options),
    author: options.author,
    comment: options.comment,
    startTime: options.start,
    endTime: options.end,
    fixed: options.flexible ? false : undefined,
    duration: options.duration,
    allServices: options.allServices,
  });
  return report(format, results);
}

export interface RescheduleCommandOptions extends TargetOptions {
  nextCheck?: Timestamp;
}

export async function runReschedule(
  client: IcingaClient,
  format: OutputFormat,
  options: RescheduleCommandOptions
): Promise<ActionResult[]> {
  const results = await client.actions.rescheduleCheck({
    target: targetFrom(options),
    nextCheck: options.nextCheck,
  });
  return report(format, results);
}
