/**
 * Object Commands
 *
 * Query, create, modify and delete configuration objects.
 */

import type { IcingaClient } from "../../client.js";
import type { ConfigObject } from "../../models/common.js";
import type { ServiceStatus } from "../../models/objects.js";
import type { JsonObject } from "../../types/json.js";
import { normalizeObjectType } from "../../types/object-types.js";
import {
  actionResultTable,
  formatCell,
  formatState,
  printResult,
  type Cell,
  type OutputFormat,
} from "../reporter.js";

export interface ListObjectsCommandOptions {
  attrs?: string[];
  filter?: string;
  joins?: string[];
  allJoins?: boolean;
}

/**
 * `objects <type> [name]`
 */
export async function runListObjects(
  client: IcingaClient,
  format: OutputFormat,
  typeInput: string,
  name: string | undefined,
  options: ListObjectsCommandOptions
): Promise<ConfigObject[]> {
  const type = normalizeObjectType(typeInput);
  const objects = await client.objects.list(type, {
    name,
    attrs: options.attrs,
    filter: options.filter,
    joins: options.allJoins ? true : options.joins,
  });

  const columns = options.attrs ?? [];
  printResult(format, objects, (items) => ({
    headers: ["NAME", "TYPE", ...columns.map((column) => column.toUpperCase())],
    rows: items.map((item): Cell[] => [
      item.name,
      item.type,
      ...columns.map((column) => formatCell(item.attrs[column])),
    ]),
  }));
  return objects;
}

/**
 * `service-state <host> <service>`
 */
export async function runServiceState(
  client: IcingaClient,
  format: OutputFormat,
  host: string,
  service: string
): Promise<ServiceStatus> {
  const status = await client.getServiceState(host, service);
  printResult(format, status, (item) => ({
    headers: ["HOST", "SERVICE", "STATE", "OUTPUT"],
    rows: [[item.host, item.service, formatState(item.state), item.output]],
  }));
  return status;
}

export interface CreateObjectCommandOptions {
  template?: string[];
  attr?: JsonObject;
  var?: JsonObject;
}

function withVars(attrs: JsonObject | undefined, vars: JsonObject | undefined): JsonObject {
  const merged: JsonObject = { ...attrs };
  if (vars && Object.keys(vars).length > 0) merged.vars = vars;
  return merged;
}

/**
 * `create <type> <name>`
 */
export async function runCreateObject(
  client: IcingaClient,
  format: OutputFormat,
  typeInput: string,
  name: string,
  options: CreateObjectCommandOptions
): Promise<void> {
  const type = normalizeObjectType(typeInput);
  const results = await client.objects.create(type, name, {
    templates: options.template,
    attrs: withVars(options.attr, options.var),
  });
  printResult(format, results, actionResultTable);
}

export interface UpdateObjectCommandOptions {
  attr?: JsonObject;
  var?: JsonObject;
}

/**
 * `update <type> <name>`
 */
export async function runUpdateObject(
  client: IcingaClient,
  format: OutputFormat,
  typeInput: string,
  name: string,
  options: UpdateObjectCommandOptions
): Promise<void> {
  const type = normalizeObjectType(typeInput);
  const results = await client.objects.update(type, name, withVars(options.attr, options.var));
  printResult(format, results, actionResultTable);
}

export interface DeleteObjectCommandOptions {
  filter?: string;
  cascade: boolean;
}

/**
 * `delete <type> [name]`
 */
export async function runDeleteObject(
  client: IcingaClient,
  format: OutputFormat,
  typeInput: string,
  name: string | undefined,
  options: DeleteObjectCommandOptions
): Promise<void> {
  const type = normalizeObjectType(typeInput);
  const results = await client.objects.delete(type, {
    name,
    filter: options.filter,
    cascade: options.cascade,
  });
  printResult(format, results, actionResultTable);
}
