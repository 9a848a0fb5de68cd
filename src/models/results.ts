/**
 * Result models for actions, status, config packages and introspection
 */

import { z } from "zod";
import { jsonObjectSchema, jsonValueSchema, type JsonObject, type JsonValue } from "../types/json.js";
import { integerSchema, stringListSchema } from "./common.js";

/**
 * Per-object outcome of an action or a create/modify/delete call
 */
export interface ActionResult {
  code: number;
  status: string;
  name?: string;
  type?: string;
  errors: string[];
  /** Returned by `generate-ticket` */
  ticket?: string;
  legacyId?: number;
}

export const actionResultSchema = z
  .object({
    code: integerSchema,
    status: z.string(),
    name: z.string().optional(),
    type: z.string().optional(),
    errors: z.array(z.string()).optional(),
    ticket: z.string().optional(),
    legacy_id: integerSchema.optional(),
  })
  .transform(
    (raw): ActionResult => ({
      code: raw.code,
      status: raw.status,
      name: raw.name,
      type: raw.type,
      errors: raw.errors ?? [],
      ticket: raw.ticket,
      legacyId: raw.legacy_id,
    })
  );

/**
 * Performance data value reported by `/v1/status`
 */
export interface PerfdataValue {
  label: string;
  value: number;
  unit?: string;
}

export const perfdataValueSchema = z
  .object({
    label: z.string(),
    value: z.number(),
    unit: z.string().optional(),
  })
  .transform(
    (raw): PerfdataValue => ({
      label: raw.label,
      value: raw.value,
      unit: raw.unit || undefined,
    })
  );

export interface StatusEntry {
  name: string;
  status: JsonObject;
  perfdata: PerfdataValue[];
}

export const statusEntrySchema = z.object({
  name: z.string(),
  status: jsonObjectSchema.default({}),
  perfdata: z.array(perfdataValueSchema).default([]),
});

export interface ConfigPackage {
  name: string;
  stages: string[];
  activeStage?: string;
}

export const configPackageSchema = z
  .object({
    name: z.string(),
    stages: stringListSchema,
    "active-stage": z.string().optional(),
  })
  .transform(
    (raw): ConfigPackage => ({
      name: raw.name,
      stages: raw.stages,
      activeStage: raw["active-stage"] || undefined,
    })
  );

/**
 * Outcome of uploading a stage
 */
export interface StageResult {
  code: number;
  status: string;
  package: string;
  stage: string;
}

export const stageResultSchema = z.object({
  code: integerSchema,
  status: z.string(),
  package: z.string(),
  stage: z.string(),
});

export interface StageFile {
  name: string;
  type: "file" | "directory";
}

export const stageFileSchema = z.object({
  name: z.string(),
  type: z.enum(["file", "directory"]),
});

export interface TypeInfo {
  name: string;
  pluralName?: string;
  abstract: boolean;
  base?: string;
  fields: string[];
}

export const typeInfoSchema = z
  .object({
    name: z.string(),
    plural_name: z.string().optional(),
    abstract: z.boolean().default(false),
    base: z.string().optional(),
    fields: jsonObjectSchema.default({}),
  })
  .transform(
    (raw): TypeInfo => ({
      name: raw.name,
      pluralName: raw.plural_name,
      abstract: raw.abstract,
      base: raw.base,
      fields: Object.keys(raw.fields).sort(),
    })
  );

export interface TemplateInfo {
  name: string;
  type: string;
}

export const templateInfoSchema = z.object({
  name: z.string(),
  type: z.string(),
});

export interface VariableInfo {
  name: string;
  type: string;
  value: JsonValue;
}

export const variableInfoSchema = z.object({
  name: z.string(),
  type: z.string(),
  value: jsonValueSchema.default(null),
});
