/**
 * Tests for the Icinga API Client
 */

import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { AxiosError, type AxiosAdapter } from "axios";
import { IcingaClient, createIcingaClient } from "../client.js";
import {
  AuthenticationError,
  MalformedResponseError,
  NotFoundError,
  TransportError,
  ValidationError,
} from "../errors.js";
import { SERVICE_STATUS_ATTRS } from "../models/objects.js";
import { HostState, ServiceState } from "../types/states.js";
import { createTestClient, ndjson, silentLogger } from "./helpers.js";

// ==================== Helpers ====================

const BASIC_AUTH = `Basic ${Buffer.from("root:test-secret").toString("base64")}`;

const PING4 = {
  name: "Host1!ping4",
  type: "Service",
  attrs: {
    host_name: "Host1",
    name: "ping4",
    state: 0.0,
    last_check_result: { output: "OK", state: 0.0, exit_status: 0.0 },
  },
  joins: {},
  meta: {},
};

const CREATED = { results: [{ code: 200.0, status: "Object was created" }] };

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

// ==================== Tests ====================

describe("IcingaClient", () => {
  // ==================== Constructor ====================

  describe("constructor", () => {
    it("requires credentials", () => {
      expect(() => createIcingaClient({ url: "https://icinga.test:5665" })).toThrow(ValidationError);
    });

    it("exposes the resolved configuration", () => {
      const { client } = createTestClient([{ body: CREATED }], { timeout: 2500 });
      expect(client).toBeInstanceOf(IcingaClient);
      expect(client.config.url).toBe("https://icinga.test:5665");
      expect(client.config.timeout).toBe(2500);
    });
  });

  // ==================== Transport ====================

  describe("transport", () => {
    it("sends every request as POST with the method override header", async () => {
      const { client, requests } = createTestClient([{ body: { results: [PING4] } }]);

      await client.getServiceState("Host1", "ping4");

      expect(requests).toHaveLength(1);
      const [request] = requests;
      expect(request.method).toBe("post");
      expect(request.baseURL).toBe("https://icinga.test:5665/v1/");
      expect(request.url).toBe("objects/services/Host1%21ping4");
      expect(request.headers["x-http-method-override"]).toBe("GET");
      expect(request.headers["accept"]).toBe("application/json");
      expect(request.headers["user-agent"]).toBe("icinga-api-client/0.1.0");
      expect(request.headers["authorization"]).toBe(BASIC_AUTH);
      expect(request.body).toEqual({ attrs: SERVICE_STATUS_ATTRS });
    });

    it("maps timeouts to TransportError", async () => {
      const adapter: AxiosAdapter = async () => {
        throw new AxiosError("timeout of 1000ms exceeded", "ECONNABORTED");
      };
      const client = new IcingaClient({
        username: "root",
        password: "test-secret",
        timeout: 1000,
        adapter,
        logger: silentLogger,
      });

      const error = await caught(client.status.list());

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: "Request timed out after 1000ms" });
    });

    it("maps connection failures to TransportError", async () => {
      const adapter: AxiosAdapter = async () => {
        throw new AxiosError("connect ECONNREFUSED 127.0.0.1:5665", "ECONNREFUSED");
      };
      const client = new IcingaClient({
        username: "root",
        password: "test-secret",
        adapter,
        logger: silentLogger,
      });

      const error = await caught(client.variables.list());

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: "Network error: connect ECONNREFUSED 127.0.0.1:5665" });
    });
  });

  // ==================== Responses ====================

  describe("responses", () => {
    it("reads the state and output of a service", async () => {
      const { client } = createTestClient([{ body: { results: [PING4] } }]);

      const status = await client.getServiceState("Host1", "ping4");

      expect(status).toEqual({
        host: "Host1",
        service: "ping4",
        state: ServiceState.OK,
        output: "OK",
      });
    });

    it("ignores unknown fields", async () => {
      const body = {
        results: [{ ...PING4, extra: true, attrs: { ...PING4.attrs, flapping: false, new_attr: [1] } }],
        generated_by: "test",
      };
      const { client } = createTestClient([{ body }]);

      const status = await client.getServiceState("Host1", "ping4");
      expect(status.state).toBe(ServiceState.OK);
    });

    it("names a missing required field", async () => {
      const body = { results: [{ name: "Host1!ping4", attrs: { host_name: "Host1", name: "ping4" } }] };
      const { client } = createTestClient([{ body }]);

      const error = await caught(client.getServiceState("Host1", "ping4"));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: "results.0.attrs.state", status: 200 });
    });

    it("raises NotFoundError for an empty result set", async () => {
      const { client } = createTestClient([{ body: { results: [] } }]);

      const error = await caught(client.getServiceState("Host1", "missing"));

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: 'No Service named "Host1!missing"' });
    });

    it("maps 404 responses to NotFoundError", async () => {
      const { client } = createTestClient([
        { status: 404, body: { error: 404, status: "No objects found." } },
      ]);

      const error = await caught(client.objects.list("Host", { name: "ghost" }));

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ status: 404, message: "No objects found." });
    });

    it("maps 401 responses to AuthenticationError", async () => {
      const { client } = createTestClient([{ status: 401, body: "Unauthorized" }]);

      const error = await caught(client.listHosts());

      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ status: 401, message: "Unauthorized" });
    });

    it("raises MalformedResponseError for a non-JSON success body", async () => {
      const { client } = createTestClient([{ status: 200, body: "<html>proxy</html>" }]);

      const error = await caught(client.status.list());

      expect(error).toBeInstanceOf(MalformedResponseError);
      expect(error).toMatchObject({ message: "Response is not valid JSON: <html>proxy</html>" });
    });

    it("decodes hosts with defaults for absent attributes", async () => {
      const { client, requests } = createTestClient([
        {
          body: {
            results: [
              {
                name: "web01",
                type: "Host",
                attrs: {
                  name: "web01",
                  address: "192.0.2.10",
                  state: 1.0,
                  acknowledgement: 1.0,
                  last_check: 1_700_000_000,
                  vars: null,
                },
              },
            ],
          },
        },
      ]);

      const host = await client.getHost("web01");

      expect(requests[0].url).toBe("objects/hosts/web01");
      expect(host).toMatchObject({
        name: "web01",
        displayName: "web01",
        address: "192.0.2.10",
        state: HostState.DOWN,
        acknowledged: true,
        groups: [],
        vars: {},
      });
      expect(host.lastCheck).toEqual(new Date(1_700_000_000_000));
    });
  });

  // ==================== Objects ====================

  describe("objects", () => {
    it("applies configured host defaults when creating hosts", async () => {
      const { client, requests } = createTestClient([{ body: CREATED }], {
        newHostDefaults: {
          templates: ["generic-host"],
          attrs: { check_command: "hostalive", vars: { os: "Linux" } },
        },
      });

      const results = await client.createHost("web01", {
        address: "192.0.2.10",
        vars: { env: "prod" },
      });

      expect(results).toEqual([{ code: 200, status: "Object was created", errors: [] }]);
      expect(requests[0].url).toBe("objects/hosts/web01");
      expect(requests[0].headers["x-http-method-override"]).toBe("PUT");
      expect(requests[0].body).toEqual({
        templates: ["generic-host"],
        attrs: {
          check_command: "hostalive",
          address: "192.0.2.10",
          vars: { os: "Linux", env: "prod" },
        },
      });
    });

    it("creates services under their host", async () => {
      const { client, requests } = createTestClient([{ body: CREATED }]);

      await client.createService("web01", "http", { checkCommand: "http", checkInterval: 60 });

      expect(requests[0].url).toBe("objects/services/web01%21http");
      expect(requests[0].body).toEqual({ attrs: { check_command: "http", check_interval: 60 } });
    });

    it("surfaces per-object errors of a failed create", async () => {
      const { client } = createTestClient([
        {
          status: 500,
          body: {
            results: [
              {
                code: 500,
                status: "Object could not be created.",
                errors: ["Error: Object 'web01' already exists."],
              },
            ],
          },
        },
      ]);

      const error = await caught(client.objects.create("Host", "web01"));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        status: 500,
        remoteErrors: ["Error: Object 'web01' already exists."],
      });
    });

    it("deletes objects with the DELETE override", async () => {
      const { client, requests } = createTestClient([
        { body: { results: [{ code: 200, status: "Object was deleted." }] } },
      ]);

      await client.objects.delete("Service", { name: "web01!http" });

      expect(requests[0].headers["x-http-method-override"]).toBe("DELETE");
      expect(requests[0].body).toEqual({ cascade: 1 });
    });
  });

  // ==================== Actions ====================

  describe("actions", () => {
    it("submits a service check result", async () => {
      const { client, requests } = createTestClient([
        {
          body: {
            results: [{ code: 200, status: "Successfully processed check result for object 'Host1!ping4'." }],
          },
        },
      ]);

      const results = await client.sendServiceCheckResult("Host1", "ping4", {
        exitStatus: "critical",
        pluginOutput: "PING CRITICAL - Packet loss = 100%",
      });

      expect(results[0].code).toBe(200);
      expect(requests[0].url).toBe("actions/process-check-result");
      expect(requests[0].headers["x-http-method-override"]).toBe("POST");
      expect(requests[0].body).toEqual({
        type: "Service",
        service: "Host1!ping4",
        exit_status: 2,
        plugin_output: "PING CRITICAL - Packet loss = 100%",
      });
    });

    it("rejects a notification without a host name before sending", async () => {
      const { client, requests } = createTestClient([{ body: CREATED }]);

      const error = await caught(
        client.actions.sendCustomNotification({
          target: { host: "" },
          author: "admin",
          comment: "Test",
        })
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: "host" });
      expect(requests).toHaveLength(0);
    });

    it("returns generated tickets", async () => {
      const { client } = createTestClient([
        { body: { results: [{ code: 200, status: "Generated PKI ticket", ticket: "test-ticket" }] } },
      ]);

      const [result] = await client.actions.generateTicket("agent01");
      expect(result.ticket).toBe("test-ticket");
    });
  });

  // ==================== Events ====================

  describe("events", () => {
    it("streams decoded events", async () => {
      const stream = ndjson(
        {
          type: "CheckResult",
          timestamp: 1_700_000_000.5,
          host: "web01",
          service: "ping4",
          check_result: { output: "PING OK", state: 0.0, exit_status: 0.0 },
        },
        { type: "CommentAdded", timestamp: 1_700_000_001, comment: { author: "admin" } }
      );
      const { client, requests } = createTestClient([{ body: stream }]);

      const events = [];
      for await (const event of client.events.subscribe({ types: ["CheckResult", "CommentAdded"], queue: "test" })) {
        events.push(event);
      }

      expect(requests[0].url).toBe("events");
      expect(requests[0].body).toEqual({ types: ["CheckResult", "CommentAdded"], queue: "test" });
      expect(events).toHaveLength(2);
      expect(events[0]).toMatchObject({
        type: "CheckResult",
        host: "web01",
        service: "ping4",
        checkResult: { output: "PING OK", state: ServiceState.OK, exitStatus: 0 },
      });
      expect(events[0].timestamp).toEqual(new Date(1_700_000_000_500));
      expect(events[1]).toEqual({
        type: "CommentAdded",
        timestamp: new Date(1_700_000_001_000),
        payload: { comment: { author: "admin" } },
      });
    });

    it("maps an error status before reading events", async () => {
      const { client } = createTestClient([{ status: 403, body: Readable.from(["Forbidden"]) }]);

      const events = client.events.subscribe({ types: ["StateChange"], queue: "test" });

      const error = await caught(events.next());
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ message: "Forbidden" });
    });
  });

  // ==================== Status, packages & introspection ====================

  describe("status", () => {
    it("decodes status entries with perfdata", async () => {
      const { client, requests } = createTestClient([
        {
          body: {
            results: [
              {
                name: "CIB",
                status: { uptime: 3600.5 },
                perfdata: [{ label: "num_services_ok", value: 12.0, unit: "" }],
              },
            ],
          },
        },
      ]);

      const entries = await client.status.list("CIB");

      expect(requests[0].url).toBe("status/CIB");
      expect(entries).toEqual([
        {
          name: "CIB",
          status: { uptime: 3600.5 },
          perfdata: [{ label: "num_services_ok", value: 12, unit: undefined }],
        },
      ]);
    });
  });

  describe("packages", () => {
    it("lists packages with their active stage", async () => {
      const { client } = createTestClient([
        { body: { results: [{ name: "deploy", stages: ["stage-1"], "active-stage": "stage-1" }] } },
      ]);

      expect(await client.packages.list()).toEqual([
        { name: "deploy", stages: ["stage-1"], activeStage: "stage-1" },
      ]);
    });

    it("uploads a stage", async () => {
      const { client, requests } = createTestClient([
        {
          body: {
            results: [{ code: 200, status: "Created stage.", package: "deploy", stage: "stage-2" }],
          },
        },
      ]);

      const [result] = await client.packages.createStage("deploy", { "conf.d/a.conf": "" });

      expect(result.stage).toBe("stage-2");
      expect(requests[0].url).toBe("config/stages/deploy");
    });

    it("fetches the startup log of a stage as text", async () => {
      const { client, requests } = createTestClient([{ body: "critical/config: Error: syntax error" }]);

      const log = await client.packages.getStageErrors("deploy", "stage-2");

      expect(log).toBe("critical/config: Error: syntax error");
      expect(requests[0].url).toBe("config/files/deploy/stage-2/startup.log");
      expect(requests[0].body).toBeUndefined();
    });
  });

  describe("introspection", () => {
    it("lists type fields in sorted order", async () => {
      const { client } = createTestClient([
        {
          body: {
            results: [
              {
                name: "Host",
                plural_name: "Hosts",
                abstract: false,
                base: "Checkable",
                fields: { address: {}, address6: {}, display_name: {} },
              },
            ],
          },
        },
      ]);

      const [info] = await client.types.list("Host");
      expect(info).toEqual({
        name: "Host",
        pluralName: "Hosts",
        abstract: false,
        base: "Checkable",
        fields: ["address", "address6", "display_name"],
      });
    });

    it("lists templates", async () => {
      const { client, requests } = createTestClient([
        { body: { results: [{ name: "generic-host", type: "Host" }] } },
      ]);

      expect(await client.templates.list("Host")).toEqual([{ name: "generic-host", type: "Host" }]);
      expect(requests[0].url).toBe("templates/hosts");
    });

    it("lists variables", async () => {
      const { client } = createTestClient([
        { body: { results: [{ name: "NodeName", type: "String", value: "master1" }] } },
      ]);

      expect(await client.variables.list()).toEqual([
        { name: "NodeName", type: "String", value: "master1" },
      ]);
    });
  });
});
