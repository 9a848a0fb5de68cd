/**
 * Check results
 */

import { z } from "zod";
import { serviceStateSchema, ServiceState } from "../types/states.js";
import { integerSchema, optionalTimestampSchema } from "./common.js";

/**
 * Performance data entries are strings, or `PerfdataValue` objects when Icinga
 * parsed them already
 */
const performanceDataSchema = z
  .union([z.array(z.union([z.string(), z.object({ label: z.string() }).passthrough()])), z.null()])
  .optional()
  .transform((entries) =>
    (entries ?? []).map((entry) => (typeof entry === "string" ? entry : entry.label))
  );

const commandSchema = z
  .union([z.array(z.union([z.string(), z.number()])), z.string(), z.null()])
  .optional()
  .transform((command) => {
    if (command === null || command === undefined) return undefined;
    return typeof command === "string" ? [command] : command.map(String);
  });

export const checkResultSchema = z
  .object({
    output: z.string(),
    state: serviceStateSchema,
    exit_status: integerSchema.optional(),
    execution_start: optionalTimestampSchema,
    execution_end: optionalTimestampSchema,
    schedule_start: optionalTimestampSchema,
    schedule_end: optionalTimestampSchema,
    performance_data: performanceDataSchema,
    command: commandSchema,
    check_source: z.string().optional(),
    active: z.boolean().optional(),
    ttl: z.number().optional(),
  })
  .transform(
    (raw): CheckResult => ({
      output: raw.output,
      state: raw.state,
      exitStatus: raw.exit_status ?? raw.state,
      executionStart: raw.execution_start,
      executionEnd: raw.execution_end,
      scheduleStart: raw.schedule_start,
      scheduleEnd: raw.schedule_end,
      performanceData: raw.performance_data,
      command: raw.command,
      checkSource: raw.check_source,
      active: raw.active,
      ttl: raw.ttl,
    })
  );

/**
 * One executed check, as reported by Icinga
 */
export interface CheckResult {
  output: string;
  state: ServiceState;
  exitStatus: number;
  executionStart?: Date;
  executionEnd?: Date;
  scheduleStart?: Date;
  scheduleEnd?: Date;
  performanceData: string[];
  command?: string[];
  checkSource?: string;
  active?: boolean;
  ttl?: number;
}

export const nullableCheckResultSchema = z
  .union([checkResultSchema, z.null()])
  .optional()
  .transform((result) => result ?? undefined);
