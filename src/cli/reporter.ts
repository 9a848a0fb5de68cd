/**
 * CLI Reporter
 *
 * Table and JSON output with colored console formatting.
 */

import { stripVTControlCharacters } from "node:util";
import pc from "picocolors";
import type { ActionResult } from "../models/results.js";
import type { JsonValue } from "../types/json.js";
import { HostState, ServiceState } from "../types/states.js";

/**
 * Output format
 */
export type OutputFormat = "table" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json"];

export type Cell = string | number | boolean | null | undefined;

/**
 * Render a value for a table cell
 */
export function formatCell(value: Cell | JsonValue): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Printed width of a cell, ignoring color codes
 */
function visibleLength(text: string): number {
  return stripVTControlCharacters(text).length;
}

/**
 * Render rows as an aligned plain-text table
 */
export function formatTable(headers: string[], rows: Cell[][]): string {
  const cells = rows.map((row) => headers.map((_, index) => formatCell(row[index])));
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...cells.map((row) => visibleLength(row[index])))
  );

  const line = (row: string[]) =>
    row
      .map((cell, index) =>
        index === row.length - 1 ? cell : cell + " ".repeat(widths[index] - visibleLength(cell))
      )
      .join("  ");

  return [pc.bold(line(headers)), ...cells.map(line)].join("\n");
}

const STATE_COLORS: Record<ServiceState, (text: string) => string> = {
  [ServiceState.OK]: pc.green,
  [ServiceState.WARNING]: pc.yellow,
  [ServiceState.CRITICAL]: pc.red,
  [ServiceState.UNKNOWN]: pc.magenta,
};

/**
 * Colored state label, e.g. a red `CRITICAL`
 */
export function formatState(state: ServiceState): string {
  return STATE_COLORS[state](ServiceState[state]);
}

const HOST_STATE_COLORS: Record<HostState, (text: string) => string> = {
  [HostState.UP]: pc.green,
  [HostState.DOWN]: pc.red,
};

/**
 * Colored host state label, e.g. a red `DOWN`
 */
export function formatHostState(state: HostState): string {
  return HOST_STATE_COLORS[state](HostState[state]);
}

/**
 * Print data as JSON, or as a table built from it
 */
export function printResult<T>(
  format: OutputFormat,
  data: T,
  toTable: (data: T) => { headers: string[]; rows: Cell[][] }
): void {
  if (format === "json") {
    console.log(JSON.stringify(data, null, 2));
    return;
  }

  const { headers, rows } = toTable(data);
  if (rows.length === 0) {
    printInfo("No results");
    return;
  }
  console.log(formatTable(headers, rows));
}

/**
 * Table layout of action results
 */
export function actionResultTable(results: ActionResult[]): { headers: string[]; rows: Cell[][] } {
  return {
    headers: ["CODE", "STATUS", "NAME"],
    rows: results.map((result) => [
      result.code >= 200 && result.code <= 299 ? pc.green(String(result.code)) : pc.red(String(result.code)),
      result.errors.length > 0 ? `${result.status} ${result.errors.join("; ")}` : result.status,
      result.name,
    ]),
  };
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(pc.red(`Error: ${message}`));
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(pc.cyan(message));
}
