/**
 * Request builders for `/v1/status`, `/v1/types`, `/v1/templates` and
 * `/v1/variables`
 */

import type { ApiRequest } from "../transport/session.js";
import { encodeName } from "../transport/session.js";
import { pluralizeObjectType, type ObjectTypeName } from "../types/object-types.js";

/**
 * Status information, optionally limited to one component
 * such as `IcingaApplication` or `CIB`
 */
export function buildListStatus(statusType?: string): ApiRequest {
  return {
    method: "GET",
    path: statusType ? `status/${encodeName(statusType)}` : "status",
  };
}

export function buildListTypes(type?: ObjectTypeName): ApiRequest {
  return { method: "GET", path: type ? `types/${type}` : "types" };
}

/**
 * Templates of one object type; the filter sees each template as `tmpl`
 */
export function buildListTemplates(type: ObjectTypeName, filter?: string): ApiRequest {
  return {
    method: "GET",
    path: `templates/${pluralizeObjectType(type)}`,
    body: filter ? { filter } : undefined,
  };
}

export function buildListVariables(): ApiRequest {
  return { method: "GET", path: "variables" };
}
