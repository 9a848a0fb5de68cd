/**
 * Request builders for `/v1/objects`
 *
 * Querying, creating, modifying and deleting configuration objects.
 */

import { ValidationError } from "../errors.js";
import type { ApiRequest } from "../transport/session.js";
import { encodeName } from "../transport/session.js";
import type { JsonObject } from "../types/json.js";
import { pluralizeObjectType, type ObjectTypeName } from "../types/object-types.js";

/**
 * Filter expression with its variables
 */
export interface FilterOptions {
  /** Icinga filter expression, e.g. `match("web*", host.name)` */
  filter?: string;
  /** Variables referenced in the filter expression */
  filterVars?: JsonObject;
}

export interface ListObjectsOptions extends FilterOptions {
  /** Full object name, e.g. `web01` or `web01!ping4` */
  name?: string;
  /** Only return these attributes */
  attrs?: string[];
  /** Joined attributes, or `true` for all joins */
  joins?: string[] | true;
}

export interface CreateObjectOptions {
  templates?: string[];
  attrs?: JsonObject;
}

export interface DeleteObjectsOptions extends FilterOptions {
  name?: string;
  /** Delete dependent objects as well (default true) */
  cascade?: boolean;
}

function requireName(name: string, field = "name"): void {
  if (!name.trim()) {
    throw new ValidationError(`${field} must not be empty`, { field });
  }
}

function objectPath(type: ObjectTypeName, name?: string): string {
  const base = `objects/${pluralizeObjectType(type)}`;
  return name ? `${base}/${encodeName(name)}` : base;
}

function applyFilter(body: JsonObject, options: FilterOptions): void {
  if (options.filter) body.filter = options.filter;
  if (options.filterVars && Object.keys(options.filterVars).length > 0) {
    if (!options.filter) {
      throw new ValidationError("filterVars require a filter expression", {
        field: "filterVars",
      });
    }
    body.filter_vars = options.filterVars;
  }
}

/**
 * Query objects of one type
 */
export function buildListObjects(
  type: ObjectTypeName,
  options: ListObjectsOptions = {}
): ApiRequest {
  const body: JsonObject = {};
  if (options.attrs && options.attrs.length > 0) body.attrs = options.attrs;
  applyFilter(body, options);
  if (options.joins === true) {
    body.all_joins = "1";
  } else if (options.joins && options.joins.length > 0) {
    body.joins = options.joins;
  }

  return { method: "GET", path: objectPath(type, options.name), body };
}

/**
 * Create an object from templates and attributes
 */
export function buildCreateObject(
  type: ObjectTypeName,
  name: string,
  options: CreateObjectOptions = {}
): ApiRequest {
  requireName(name);
  if (type === "Service" && !/^[^!]+![^!]+$/.test(name)) {
    throw new ValidationError(`Service name must be "host!service", got "${name}"`, {
      field: "name",
    });
  }

  const body: JsonObject = {};
  if (options.templates && options.templates.length > 0) body.templates = options.templates;
  if (options.attrs && Object.keys(options.attrs).length > 0) body.attrs = options.attrs;

  return { method: "PUT", path: objectPath(type, name), body };
}

/**
 * Modify attributes of an existing object
 */
export function buildUpdateObject(
  type: ObjectTypeName,
  name: string,
  attrs: JsonObject
): ApiRequest {
  requireName(name);
  if (Object.keys(attrs).length === 0) {
    throw new ValidationError("attrs must not be empty", { field: "attrs" });
  }
  return { method: "POST", path: objectPath(type, name), body: { attrs } };
}

/**
 * Delete one object by name, or all objects matching a filter
 */
export function buildDeleteObjects(
  type: ObjectTypeName,
  options: DeleteObjectsOptions
): ApiRequest {
  if (!options.name && !options.filter) {
    throw new ValidationError("Either a name or a filter is required", { field: "name" });
  }
  if (options.name && options.filter) {
    throw new ValidationError("name and filter are mutually exclusive", { field: "filter" });
  }

  const body: JsonObject = {};
  applyFilter(body, options);
  if (options.cascade ?? true) body.cascade = 1;

  return { method: "DELETE", path: objectPath(type, options.name), body };
}
