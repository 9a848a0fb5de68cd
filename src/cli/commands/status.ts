/**
 * Status Command
 */

import type { IcingaClient } from "../../client.js";
import type { StatusEntry } from "../../models/results.js";
import { printResult, type OutputFormat } from "../reporter.js";

function formatPerfdata(entry: StatusEntry): string {
  return entry.perfdata
    .map((value) => `${value.label}=${value.value}${value.unit ?? ""}`)
    .join(" ");
}

/**
 * `status [component]`
 */
export async function runStatus(
  client: IcingaClient,
  format: OutputFormat,
  component: string | undefined
): Promise<StatusEntry[]> {
  const entries = await client.status.list(component);
  printResult(format, entries, (items) => ({
    headers: ["NAME", "PERFDATA"],
    rows: items.map((entry) => [entry.name, formatPerfdata(entry)]),
  }));
  return entries;
}
