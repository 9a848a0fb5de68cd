/**
 * Icinga configuration object types and their URL names
 */

import { ValidationError } from "../errors.js";

export const OBJECT_TYPES = [
  "ApiListener",
  "ApiUser",
  "CheckCommand",
  "CheckerComponent",
  "CheckResultReader",
  "Comment",
  "CompatLogger",
  "Dependency",
  "Downtime",
  "ElasticsearchWriter",
  "Endpoint",
  "EventCommand",
  "ExternalCommandListener",
  "FileLogger",
  "GelfWriter",
  "GraphiteWriter",
  "Host",
  "HostGroup",
  "IcingaApplication",
  "IcingaDB",
  "IdoMysqlConnection",
  "IdoPgsqlConnection",
  "InfluxdbWriter",
  "Influxdb2Writer",
  "JournaldLogger",
  "LivestatusListener",
  "Notification",
  "NotificationCommand",
  "NotificationComponent",
  "OpenTsdbWriter",
  "PerfdataWriter",
  "ScheduledDowntime",
  "Service",
  "ServiceGroup",
  "SyslogLogger",
  "TimePeriod",
  "User",
  "UserGroup",
  "Zone",
] as const;

export type ObjectTypeName = (typeof OBJECT_TYPES)[number];

/**
 * Types that may be addressed by actions taking a host or service
 */
export type HostOrService = "Host" | "Service";

/**
 * URL segment of an object type: `Host` → `hosts`, `Dependency` → `dependencies`
 */
export function pluralizeObjectType(type: ObjectTypeName): string {
  const lower = type.toLowerCase();
  if (lower.endsWith("y")) {
    return `${lower.slice(0, -1)}ies`;
  }
  return `${lower}s`;
}

function squash(name: string): string {
  return name.replace(/[_\s-]/g, "").toLowerCase();
}

const LOOKUP = new Map<string, ObjectTypeName>();
for (const type of OBJECT_TYPES) {
  LOOKUP.set(squash(type), type);
  LOOKUP.set(squash(pluralizeObjectType(type)), type);
}

/**
 * Resolve user input such as `host`, `hosts`, `check_command` or
 * `checkcommands` to the canonical type name
 */
export function normalizeObjectType(input: string): ObjectTypeName {
  const type = LOOKUP.get(squash(input));
  if (!type) {
    throw new ValidationError(`Unknown object type "${input}"`, { field: "type" });
  }
  return type;
}

export function isObjectType(value: string): value is ObjectTypeName {
  return OBJECT_TYPES.some((type) => type === value);
}
