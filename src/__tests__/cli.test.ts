/**
 * CLI Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import type { IcingaClientOptions } from "../client.js";
import { formatEvent, parseEventTypes } from "../cli/commands/events.js";
import { collectAssignment, parseTimestamp, parseValue } from "../cli/options.js";
import { EXIT_CODES, clientOptionsFrom, runCli } from "../cli/program.js";
import { formatCell, formatTable, printError, printInfo } from "../cli/reporter.js";
import { ValidationError } from "../errors.js";
import { HostState, ServiceState } from "../types/states.js";
import { createTestClient, ndjson, type StubResponse } from "./helpers.js";

const ANSI = /\x1b\[[0-9;]*m/g;

function strip(text: string): string {
  return text.replace(ANSI, "");
}

function cli(responses: StubResponse[]) {
  const { client, requests } = createTestClient(responses);
  const createClient = vi.fn((_options: IcingaClientOptions, _configFile?: string) => client);
  return { createClient, requests };
}

const PING4 = {
  name: "Host1!ping4",
  type: "Service",
  attrs: {
    host_name: "Host1",
    name: "ping4",
    state: 0.0,
    last_check_result: { output: "OK", state: 0.0 },
  },
};

describe("CLI Reporter", () => {
  let consoleSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("aligns table columns", () => {
    const table = formatTable(
      ["NAME", "TYPE"],
      [
        ["web01", "Host"],
        ["db", "Host"],
      ]
    );

    expect(strip(table).split("\n")).toEqual(["NAME   TYPE", "web01  Host", "db     Host"]);
  });

  it("ignores color codes when measuring columns", () => {
    const table = formatTable(["CODE", "NAME"], [["\x1b[32m200\x1b[39m", "web01"], ["404", "db"]]);

    expect(strip(table).split("\n")).toEqual(["CODE  NAME", "200   web01", "404   db"]);
  });

  it("renders cells", () => {
    expect(formatCell(undefined)).toBe("");
    expect(formatCell(null)).toBe("");
    expect(formatCell(42)).toBe("42");
    expect(formatCell(["a", "b"])).toBe('["a","b"]');
  });

  it("prints errors and info", () => {
    printError("boom");
    printInfo("hello");

    expect(strip(String(consoleErrorSpy.mock.calls[0][0]))).toBe("Error: boom");
    expect(strip(String(consoleSpy.mock.calls[0][0]))).toBe("hello");
  });
});

describe("option parsers", () => {
  it("decodes JSON values and keeps other text", () => {
    expect(parseValue("42")).toBe(42);
    expect(parseValue("false")).toBe(false);
    expect(parseValue('["a","b"]')).toEqual(["a", "b"]);
    expect(parseValue("192.0.2.10")).toBe("192.0.2.10");
  });

  it("collects key=value assignments", () => {
    const first = collectAssignment("address=192.0.2.10");
    expect(collectAssignment("check_interval=60", first)).toEqual({
      address: "192.0.2.10",
      check_interval: 60,
    });
    expect(() => collectAssignment("=x")).toThrow('Expected key=value, got "=x".');
  });

  it("parses epoch seconds and ISO dates", () => {
    expect(parseTimestamp("1700000000")).toBe(1_700_000_000);
    expect(parseTimestamp("2023-11-14T22:13:20Z")).toEqual(new Date(1_700_000_000_000));
    expect(() => parseTimestamp("tomorrow")).toThrow("Must be epoch seconds or an ISO 8601 date.");
  });

  it("resolves event types case-insensitively", () => {
    expect(parseEventTypes(["checkresult", "StateChange"])).toEqual(["CheckResult", "StateChange"]);
    expect(() => parseEventTypes(["Unknown"])).toThrow(ValidationError);
  });

  it("maps global options to client options", () => {
    expect(
      clientOptionsFrom({ url: "https://a.test", user: "ops", ca: "/ca.pem", format: "table", debug: 0 })
    ).toEqual({ url: "https://a.test", username: "ops", caCertificate: "/ca.pem" });
  });
});

describe("formatEvent", () => {
  it("prints events as JSON lines", () => {
    const line = formatEvent(
      { type: "ObjectCreated", timestamp: new Date(1_700_000_000_000), payload: { object_name: "web01" } },
      "json"
    );
    expect(line).toBe(
      '{"type":"ObjectCreated","timestamp":"2023-11-14T22:13:20.000Z","payload":{"object_name":"web01"}}'
    );
  });

  it("summarizes state changes", () => {
    const line = formatEvent(
      {
        type: "StateChange",
        timestamp: new Date(1_700_000_000_000),
        host: "web01",
        service: "disk",
        state: ServiceState.CRITICAL,
        stateType: 1,
      },
      "table"
    );
    expect(strip(line)).toBe("2023-11-14T22:13:20.000Z  StateChange  web01!disk  CRITICAL");
  });

  it("names host states for host events", () => {
    const line = formatEvent(
      {
        type: "StateChange",
        timestamp: new Date(1_700_000_000_000),
        host: "web01",
        state: HostState.DOWN,
        stateType: 1,
      },
      "table"
    );
    expect(strip(line)).toBe("2023-11-14T22:13:20.000Z  StateChange  web01  DOWN");
  });
});

describe("runCli", () => {
  let consoleSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the state of a service as JSON", async () => {
    const { createClient, requests } = cli([{ body: { results: [PING4] } }]);

    const code = await runCli(["--format", "json", "service-state", "Host1", "ping4"], { createClient });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(requests[0].url).toBe("objects/services/Host1%21ping4");
    expect(JSON.parse(String(consoleSpy.mock.calls[0][0]))).toEqual({
      host: "Host1",
      service: "ping4",
      state: 0,
      output: "OK",
    });
  });

  it("prints the state of a service as a table", async () => {
    const { createClient } = cli([{ body: { results: [PING4] } }]);

    await runCli(["service-state", "Host1", "ping4"], { createClient });

    const lines = strip(String(consoleSpy.mock.calls[0][0])).split("\n");
    expect(lines[0].split(/\s+/)).toEqual(["HOST", "SERVICE", "STATE", "OUTPUT"]);
    expect(lines[1].split(/\s+/)).toEqual(["Host1", "ping4", "OK", "OK"]);
  });

  it("passes global connection options to the client factory", async () => {
    const { createClient } = cli([{ body: { results: [] } }]);

    await runCli(
      ["--url", "https://other.test:5665", "-u", "ops", "-p", "test-secret", "--timeout", "3000", "-c", "/tmp/icinga.json", "status"],
      { createClient }
    );

    expect(createClient).toHaveBeenCalledTimes(1);
    expect(createClient.mock.calls[0][0]).toMatchObject({
      url: "https://other.test:5665",
      username: "ops",
      password: "test-secret",
      timeout: 3000,
    });
    expect(createClient.mock.calls[0][1]).toBe("/tmp/icinga.json");
  });

  it("creates objects from templates, attributes and vars", async () => {
    const { createClient, requests } = cli([{ body: { results: [{ code: 200, status: "Object was created" }] } }]);

    const code = await runCli(
      [
        "create",
        "host",
        "web01",
        "--template",
        "generic-host",
        "--attr",
        "address=192.0.2.10",
        "--attr",
        "enable_notifications=false",
        "--var",
        "os=Linux",
      ],
      { createClient }
    );

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(requests[0].url).toBe("objects/hosts/web01");
    expect(requests[0].headers["x-http-method-override"]).toBe("PUT");
    expect(requests[0].body).toEqual({
      templates: ["generic-host"],
      attrs: { address: "192.0.2.10", enable_notifications: false, vars: { os: "Linux" } },
    });
  });

  it("submits a check result", async () => {
    const { createClient, requests } = cli([{ body: { results: [{ code: 200, status: "Processed" }] } }]);

    const code = await runCli(
      ["check-result", "-H", "Host1", "-s", "ping4", "-e", "critical", "-o", "PING CRITICAL", "--perfdata", "pl=100%"],
      { createClient }
    );

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(requests[0].body).toEqual({
      type: "Service",
      service: "Host1!ping4",
      exit_status: 2,
      plugin_output: "PING CRITICAL",
      performance_data: ["pl=100%"],
    });
  });

  it("deletes without cascade", async () => {
    const { createClient, requests } = cli([{ body: { results: [{ code: 200, status: "Object was deleted." }] } }]);

    await runCli(["delete", "service", "web01!http", "--no-cascade"], { createClient });

    expect(requests[0].url).toBe("objects/services/web01%21http");
    expect(requests[0].body).toEqual({});
  });

  it("fails locally when a notification has no host", async () => {
    const { createClient, requests } = cli([{ body: { results: [] } }]);

    const code = await runCli(["notify", "--author", "admin", "--comment", "Test"], { createClient });

    expect(code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(requests).toHaveLength(0);
    expect(strip(String(consoleErrorSpy.mock.calls[0][0]))).toBe("Error: host is required");
  });

  it("exits with 1 when the API reports an error", async () => {
    const { createClient } = cli([{ status: 404, body: { error: 404, status: "No objects found." } }]);

    const code = await runCli(["objects", "host", "ghost"], { createClient });

    expect(code).toBe(EXIT_CODES.FAILURE);
    expect(strip(String(consoleErrorSpy.mock.calls[0][0]))).toBe("Error: No objects found.");
  });

  it("exits with 2 on missing required options", async () => {
    const { createClient } = cli([{ body: { results: [] } }]);

    expect(await runCli(["check-result", "-H", "Host1"], { createClient })).toBe(EXIT_CODES.USAGE_ERROR);
    expect(await runCli(["--format", "xml", "status"], { createClient })).toBe(EXIT_CODES.USAGE_ERROR);
    expect(createClient).not.toHaveBeenCalled();
  });

  it("exits with 0 after printing help", async () => {
    expect(await runCli(["--help"])).toBe(EXIT_CODES.SUCCESS);
  });

  it("stops streaming events at the limit", async () => {
    const stream = ndjson(
      { type: "CheckResult", timestamp: 1_700_000_000, host: "web01", check_result: { output: "UP", state: 0 } },
      { type: "CheckResult", timestamp: 1_700_000_001, host: "web02", check_result: { output: "UP", state: 0 } }
    );
    const { createClient, requests } = cli([{ body: stream }]);

    const code = await runCli(["-f", "json", "events", "--type", "checkresult", "-q", "cli", "-n", "1"], {
      createClient,
    });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(requests[0].body).toEqual({ types: ["CheckResult"], queue: "cli" });
    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(consoleSpy.mock.calls[0][0]))).toMatchObject({
      type: "CheckResult",
      host: "web01",
      timestamp: "2023-11-14T22:13:20.000Z",
    });
  });
});
