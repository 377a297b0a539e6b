// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { describe, it, expect, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createHealthLakeServer, toToolResult } from "../src/server/index.js";
import type { ToolContext } from "../src/tools/context.js";
import { fakeContext, TEST_ENDPOINT } from "./fakes.js";

const TOOL_NAMES = [
  "create_datastore",
  "delete_datastore",
  "describe_datastore",
  "list_datastores",
  "start_fhir_import_job",
  "start_fhir_export_job",
  "describe_fhir_import_job",
  "describe_fhir_export_job",
  "list_fhir_import_jobs",
  "list_fhir_export_jobs",
  "tag_resource",
  "untag_resource",
  "list_tags_for_resource",
  "read_fhir_resource",
  "search_fhir_resources",
  "search_fhir_resources_advanced",
  "create_fhir_resource",
  "update_fhir_resource",
  "delete_fhir_resource",
  "patch_fhir_resource",
  "get_fhir_resource_history",
  "get_datastore_capabilities",
  "create_fhir_bundle",
  "search_fhir_compartment",
  "create_patient_template",
  "create_observation_template",
  "validate_fhir_resource",
];

let client: Client | undefined;

async function connect(ctx: ToolContext): Promise<Client> {
  const server = createHealthLakeServer({ version: "0.0.0-test", context: ctx });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  client = new Client({ name: "test-client", version: "0.0.0" });
  await client.connect(clientTransport);
  return client;
}

async function callTool(c: Client, name: string, args: Record<string, unknown>) {
  return CallToolResultSchema.parse(await c.callTool({ name, arguments: args }));
}

function firstText(result: { content: Array<{ type: string; text?: string }> }): string {
  const item = result.content[0];
  if (item?.type !== "text" || item.text === undefined) throw new Error("expected a text content item");
  return item.text;
}

afterEach(async () => {
  await client?.close();
  client = undefined;
});

describe("HealthLake MCP server", () => {
  it("lists every tool", async () => {
    const c = await connect(fakeContext().ctx);
    const { tools } = await c.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([...TOOL_NAMES].sort());
  });

  it("publishes input schemas with required parameters", async () => {
    const c = await connect(fakeContext().ctx);
    const { tools } = await c.listTools();
    const read = tools.find((t) => t.name === "read_fhir_resource");
    expect(read?.inputSchema.required).toEqual(["datastore_id", "resource_type", "resource_id"]);
  });

  it("returns a local tool's value as pretty JSON text", async () => {
    const c = await connect(fakeContext().ctx);
    const result = await callTool(c, "validate_fhir_resource", { resource_data: {} });

    expect(result.isError).toBeFalsy();
    expect(JSON.parse(firstText(result))).toEqual({
      valid: false,
      issues: ["Missing required 'resourceType' field"],
      resourceType: null,
    });
  });

  it("routes a FHIR tool through the executor", async () => {
    const { ctx, execute } = fakeContext({ response: { resourceType: "Patient", id: "42" } });
    const c = await connect(ctx);

    const result = await callTool(c, "read_fhir_resource", {
      datastore_id: "test-datastore-id",
      resource_type: "Patient",
      resource_id: "42",
    });

    expect(JSON.parse(firstText(result))).toEqual({ resourceType: "Patient", id: "42" });
    expect(execute.mock.calls[0]![0].url).toBe(`${TEST_ENDPOINT}Patient/42`);
  });

  it("reports a read-only refusal as a tool error", async () => {
    const { ctx, execute } = fakeContext({ readOnly: true });
    const c = await connect(ctx);

    const result = await callTool(c, "create_fhir_resource", {
      datastore_id: "test-datastore-id",
      resource_type: "Patient",
      resource_data: { resourceType: "Patient" },
    });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe("Operation not permitted: HealthLake MCP server is in read-only mode");
    expect(execute).not.toHaveBeenCalled();
  });
});

describe("toToolResult", () => {
  it("wraps a value as JSON text", async () => {
    expect(await toToolResult(() => ({ a: 1 }))).toEqual({
      content: [{ type: "text", text: '{\n  "a": 1\n}' }],
    });
  });

  it("wraps a thrown error as an error result", async () => {
    expect(
      await toToolResult(() => {
        throw new Error("nope");
      }),
    ).toEqual({ content: [{ type: "text", text: "nope" }], isError: true });
  });
});
