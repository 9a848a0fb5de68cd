/**
 * Request builders for `/v1/config`
 *
 * Configuration packages hold stages; each stage is one uploaded set of
 * configuration files.
 */

import { ValidationError } from "../errors.js";
import type { ApiRequest } from "../transport/session.js";
import { encodeName } from "../transport/session.js";
import type { JsonObject } from "../types/json.js";

function packageSegment(packageName: string): string {
  if (!packageName.trim()) {
    throw new ValidationError("packageName is required", { field: "packageName" });
  }
  // the _ prefix marks internal packages such as _api and _etc
  if (packageName.startsWith("_")) {
    throw new ValidationError(`Package names starting with "_" are reserved: ${packageName}`, {
      field: "packageName",
    });
  }
  return encodeName(packageName);
}

function stageSegment(stageName: string): string {
  if (!stageName.trim()) {
    throw new ValidationError("stageName is required", { field: "stageName" });
  }
  return encodeName(stageName);
}

export function buildCreatePackage(packageName: string): ApiRequest {
  return { method: "POST", path: `config/packages/${packageSegment(packageName)}` };
}

export function buildListPackages(): ApiRequest {
  return { method: "GET", path: "config/packages" };
}

export function buildDeletePackage(packageName: string): ApiRequest {
  return { method: "DELETE", path: `config/packages/${packageSegment(packageName)}` };
}

export interface CreateStageOptions {
  /** Reload Icinga after validating the stage (default true on the server) */
  reload?: boolean;
  /** Activate the stage when it validates (default true on the server) */
  activate?: boolean;
}

/**
 * Upload configuration files as a new stage
 *
 * @param files - Map of relative path (e.g. `conf.d/hosts.conf`) to content
 */
export function buildCreateStage(
  packageName: string,
  files: Record<string, string>,
  options: CreateStageOptions = {}
): ApiRequest {
  if (Object.keys(files).length === 0) {
    throw new ValidationError("files must not be empty", { field: "files" });
  }
  if (options.activate === false && options.reload !== false) {
    throw new ValidationError("reload must be false when activate is false", {
      field: "reload",
    });
  }

  const body: JsonObject = { files };
  if (options.reload !== undefined) body.reload = options.reload;
  if (options.activate !== undefined) body.activate = options.activate;

  return { method: "POST", path: `config/stages/${packageSegment(packageName)}`, body };
}

export function buildListStageFiles(packageName: string, stageName: string): ApiRequest {
  return {
    method: "GET",
    path: `config/stages/${packageSegment(packageName)}/${stageSegment(stageName)}`,
  };
}

/**
 * Fetch one file of a stage; the response is plain text
 */
export function buildFetchStageFile(
  packageName: string,
  stageName: string,
  relativePath: string
): ApiRequest {
  const segments = relativePath.split("/").filter(Boolean);
  if (segments.length === 0 || segments.includes("..")) {
    throw new ValidationError(`Invalid file path "${relativePath}"`, { field: "relativePath" });
  }
  return {
    method: "GET",
    path: `config/files/${packageSegment(packageName)}/${stageSegment(stageName)}/${segments
      .map(encodeName)
      .join("/")}`,
  };
}

export function buildDeleteStage(packageName: string, stageName: string): ApiRequest {
  return {
    method: "DELETE",
    path: `config/stages/${packageSegment(packageName)}/${stageSegment(stageName)}`,
  };
}
