/**
 * Host and service models
 */

import { z } from "zod";
import { isJsonObject, type JsonObject } from "../types/json.js";
import { HostState, ServiceState, hostStateSchema, serviceStateSchema } from "../types/states.js";
import { nullableCheckResultSchema, type CheckResult } from "./check-result.js";
import { optionalTimestampSchema, stringListSchema, varsSchema } from "./common.js";

/**
 * Attributes shared by hosts and services
 */
const checkableAttrs = {
  display_name: z.string().optional(),
  check_command: z.string().optional(),
  groups: stringListSchema,
  templates: stringListSchema,
  vars: varsSchema,
  last_check_result: nullableCheckResultSchema,
  last_check: optionalTimestampSchema,
  acknowledgement: z.number().optional(),
  enable_notifications: z.boolean().optional(),
  zone: z.string().optional(),
};

interface Checkable {
  name: string;
  displayName: string;
  checkCommand?: string;
  groups: string[];
  templates: string[];
  vars: JsonObject;
  lastCheckResult?: CheckResult;
  lastCheck?: Date;
  acknowledged: boolean;
  enableNotifications?: boolean;
  zone?: string;
}

export interface Host extends Checkable {
  address?: string;
  address6?: string;
  state: HostState;
}

export interface Service extends Checkable {
  /** Full name, `host!service` */
  name: string;
  hostName: string;
  shortName: string;
  state: ServiceState;
}

export const hostAttrsSchema = z.object({
  ...checkableAttrs,
  name: z.string(),
  address: z.string().optional(),
  address6: z.string().optional(),
  state: hostStateSchema,
});

export const serviceAttrsSchema = z.object({
  ...checkableAttrs,
  name: z.string(),
  host_name: z.string(),
  state: serviceStateSchema,
});

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === "" ? undefined : value;
}

/**
 * `/v1/objects/hosts` result entry
 */
export const hostObjectSchema = z
  .object({ name: z.string(), attrs: hostAttrsSchema })
  .transform(
    ({ name, attrs }): Host => ({
      name,
      displayName: attrs.display_name || name,
      address: emptyToUndefined(attrs.address),
      address6: emptyToUndefined(attrs.address6),
      state: attrs.state,
      checkCommand: emptyToUndefined(attrs.check_command),
      groups: attrs.groups,
      templates: attrs.templates,
      vars: attrs.vars,
      lastCheckResult: attrs.last_check_result,
      lastCheck: attrs.last_check,
      acknowledged: (attrs.acknowledgement ?? 0) > 0,
      enableNotifications: attrs.enable_notifications,
      zone: emptyToUndefined(attrs.zone),
    })
  );

/**
 * `/v1/objects/services` result entry
 */
export const serviceObjectSchema = z
  .object({ name: z.string(), attrs: serviceAttrsSchema })
  .transform(
    ({ name, attrs }): Service => ({
      name,
      hostName: attrs.host_name,
      shortName: attrs.name,
      displayName: attrs.display_name || attrs.name,
      state: attrs.state,
      checkCommand: emptyToUndefined(attrs.check_command),
      groups: attrs.groups,
      templates: attrs.templates,
      vars: attrs.vars,
      lastCheckResult: attrs.last_check_result,
      lastCheck: attrs.last_check,
      acknowledged: (attrs.acknowledgement ?? 0) > 0,
      enableNotifications: attrs.enable_notifications,
      zone: emptyToUndefined(attrs.zone),
    })
  );

/**
 * Compact state of one service
 */
export interface ServiceStatus {
  host: string;
  service: string;
  state: ServiceState;
  output: string;
}

export const SERVICE_STATUS_ATTRS = ["host_name", "name", "state", "last_check_result"];

export const serviceStatusSchema = z
  .object({
    attrs: z.object({
      host_name: z.string(),
      name: z.string(),
      state: serviceStateSchema,
      last_check_result: nullableCheckResultSchema,
    }),
  })
  .transform(
    ({ attrs }): ServiceStatus => ({
      host: attrs.host_name,
      service: attrs.name,
      state: attrs.state,
      output: attrs.last_check_result?.output ?? "",
    })
  );

/**
 * Attributes accepted when creating or modifying a host
 */
export interface HostConfig {
  address?: string;
  address6?: string;
  displayName?: string;
  checkCommand?: string;
  groups?: string[];
  vars?: JsonObject;
  enableNotifications?: boolean;
  zone?: string;
}

/**
 * Attributes accepted when creating or modifying a service
 */
export interface ServiceConfig {
  displayName?: string;
  checkCommand?: string;
  groups?: string[];
  vars?: JsonObject;
  enableNotifications?: boolean;
  zone?: string;
  checkInterval?: number;
  retryInterval?: number;
}

/**
 * Serialize typed host attributes into Icinga attribute names
 */
export function hostConfigToAttrs(config: HostConfig): JsonObject {
  return compact({
    address: config.address,
    address6: config.address6,
    display_name: config.displayName,
    check_command: config.checkCommand,
    groups: config.groups,
    vars: config.vars,
    enable_notifications: config.enableNotifications,
    zone: config.zone,
  });
}

/**
 * Serialize typed service attributes into Icinga attribute names
 */
export function serviceConfigToAttrs(config: ServiceConfig): JsonObject {
  return compact({
    display_name: config.displayName,
    check_command: config.checkCommand,
    groups: config.groups,
    vars: config.vars,
    enable_notifications: config.enableNotifications,
    zone: config.zone,
    check_interval: config.checkInterval,
    retry_interval: config.retryInterval,
  });
}

type MaybeJson = JsonObject[string] | undefined;

/**
 * Drop undefined entries
 */
export function compact(entries: Record<string, MaybeJson>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Templates and attributes for a new object
 */
export interface ObjectDefinition {
  templates?: string[];
  attrs?: JsonObject;
}

/**
 * Compose named attribute sets into one definition. Later sets win per
 * attribute; templates accumulate in order; `vars` merge one level deep.
 */
export function composeDefinitions(...sets: Array<ObjectDefinition | undefined>): ObjectDefinition {
  const templates: string[] = [];
  const attrs: JsonObject = {};
  let vars: JsonObject | undefined;

  for (const set of sets) {
    if (!set) continue;
    for (const template of set.templates ?? []) {
      if (!templates.includes(template)) templates.push(template);
    }
    for (const [key, value] of Object.entries(set.attrs ?? {})) {
      if (key === "vars" && isJsonObject(value)) {
        vars = { ...vars, ...value };
      } else {
        attrs[key] = value;
      }
    }
  }

  if (vars) attrs.vars = vars;

  const definition: ObjectDefinition = {};
  if (templates.length > 0) definition.templates = templates;
  if (Object.keys(attrs).length > 0) definition.attrs = attrs;
  return definition;
}

