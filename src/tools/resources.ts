// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * FHIR REST tools (data plane). Each resolves the datastore endpoint, then
 * sends one signed request through the context's executor.
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import { compartmentUrl, historyUrl, metadataUrl, resourceUrl } from "../fhir/url.js";
import type { Bundle, BundleEntry, FhirResource, FhirResult, QueryParams } from "../fhir/types.js";
import { beginCall, beginMutation, datastoreId, endpointFor, regionName, type ToolContext } from "./context.js";
import { withErrorHandling } from "./errors.js";

const resourceType = z.string().min(1).describe("The FHIR resource type (e.g., Patient, Observation)");
const resourceId = z.string().min(1).describe("The ID of the FHIR resource");
const resourceData = z.record(z.unknown()).describe("The FHIR resource as a JSON object");
const queryParameters = z
  .record(z.union([z.string(), z.array(z.string())]))
  .describe("FHIR search parameters; an array repeats the parameter");

export const ReadResourceInputSchema = z.object({
  datastore_id: datastoreId,
  resource_type: resourceType,
  resource_id: resourceId,
  version_id: z.string().min(1).optional().describe("Read this version (vread) instead of the current one"),
  region_name: regionName,
});

export const SearchResourcesInputSchema = z.object({
  datastore_id: datastoreId,
  resource_type: resourceType,
  query_parameters: queryParameters.optional(),
  region_name: regionName,
});

export const AdvancedSearchInputSchema = z.object({
  datastore_id: datastoreId,
  resource_type: resourceType,
  search_parameters: queryParameters.optional(),
  include_parameters: z.array(z.string()).optional().describe("_include values, e.g. Patient:general-practitioner"),
  revinclude_parameters: z.array(z.string()).optional().describe("_revinclude values, e.g. Observation:subject"),
  sort_parameters: z.array(z.string()).optional().describe("Sort keys; prefix with - for descending"),
  count: z.number().int().min(1).optional().describe("Page size (_count)"),
  elements: z.array(z.string()).optional().describe("Return only these elements (_elements)"),
  region_name: regionName,
});

export const CreateResourceInputSchema = z.object({
  datastore_id: datastoreId,
  resource_type: resourceType,
  resource_data: resourceData,
  region_name: regionName,
});

export const UpdateResourceInputSchema = z.object({
  datastore_id: datastoreId,
  resource_type: resourceType,
  resource_id: resourceId,
  resource_data: resourceData,
  region_name: regionName,
});

export const ResourceRefInputSchema = z.object({
  datastore_id: datastoreId,
  resource_type: resourceType,
  resource_id: resourceId,
  region_name: regionName,
});

export const PatchResourceInputSchema = z.object({
  datastore_id: datastoreId,
  resource_type: resourceType,
  resource_id: resourceId,
  patch_operations: z
    .array(
      z.object({
        op: z.enum(["add", "remove", "replace", "move", "copy", "test"]),
        path: z.string(),
        value: z.unknown().optional(),
        from: z.string().optional(),
      }),
    )
    .min(1)
    .describe("JSON Patch (RFC 6902) operations"),
  region_name: regionName,
});

export const HistoryInputSchema = z.object({
  datastore_id: datastoreId,
  resource_type: resourceType,
  resource_id: resourceId.optional().describe("Omit for the history of the whole type"),
  count: z.number().int().min(1).optional().describe("Page size (_count)"),
  since: z.string().optional().describe("Only versions updated after this instant (_since)"),
  at: z.string().optional().describe("Versions current at this time (_at)"),
  region_name: regionName,
});

export const CapabilitiesInputSchema = z.object({
  datastore_id: datastoreId,
  region_name: regionName,
});

export const BundleInputSchema = z.object({
  datastore_id: datastoreId,
  bundle_resources: z.array(resourceData).min(1).describe("Resources to submit as bundle entries"),
  bundle_type: z.enum(["transaction", "batch"]).default("transaction"),
  region_name: regionName,
});

export const CompartmentSearchInputSchema = z.object({
  datastore_id: datastoreId,
  compartment_type: z.string().min(1).describe("Compartment type, e.g. Patient or Encounter"),
  compartment_id: z.string().min(1).describe("ID of the compartment's focal resource"),
  resource_type: resourceType.optional().describe("Limit results to this resource type"),
  query_parameters: queryParameters.optional(),
  region_name: regionName,
});

export async function readFhirResource(
  ctx: ToolContext,
  args: z.infer<typeof ReadResourceInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("read_fhir_resource", async () => {
    const call = beginCall(ctx, args.region_name);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    const url = args.version_id === undefined
      ? resourceUrl(endpoint, args.resource_type, args.resource_id)
      : historyUrl(endpoint, args.resource_type, args.resource_id, args.version_id);
    return ctx.execute({ method: "GET", url, region: call.region });
  });
}

export async function searchFhirResources(
  ctx: ToolContext,
  args: z.infer<typeof SearchResourcesInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("search_fhir_resources", async () => {
    const call = beginCall(ctx, args.region_name);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({
      method: "GET",
      url: resourceUrl(endpoint, args.resource_type),
      region: call.region,
      query: args.query_parameters,
    });
  });
}

/**
 * Build the query of an advanced search. Later keys win over the same key
 * in `search_parameters`.
 */
export function advancedSearchQuery(args: z.infer<typeof AdvancedSearchInputSchema>): QueryParams {
  const query: QueryParams = { ...args.search_parameters };
  if (args.include_parameters?.length) query._include = args.include_parameters;
  if (args.revinclude_parameters?.length) query._revinclude = args.revinclude_parameters;
  if (args.sort_parameters?.length) query._sort = args.sort_parameters.join(",");
  if (args.count !== undefined) query._count = String(args.count);
  if (args.elements?.length) query._elements = args.elements.join(",");
  return query;
}

export async function searchFhirResourcesAdvanced(
  ctx: ToolContext,
  args: z.infer<typeof AdvancedSearchInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("search_fhir_resources_advanced", async () => {
    const call = beginCall(ctx, args.region_name);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({
      method: "GET",
      url: resourceUrl(endpoint, args.resource_type),
      region: call.region,
      query: advancedSearchQuery(args),
    });
  });
}

/**
 * Reject a payload whose `resourceType` differs from the URL's type segment.
 */
export function assertResourceType(resource: FhirResource, expected: string): void {
  if (resource.resourceType !== expected) {
    const actual = typeof resource.resourceType === "string" ? resource.resourceType : "none";
    throw new ValidationError(
      `Resource type mismatch: URL has ${expected}, resource_data has ${actual}`,
      [`resourceType must be ${expected}`],
    );
  }
}

export async function createFhirResource(
  ctx: ToolContext,
  args: z.infer<typeof CreateResourceInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("create_fhir_resource", async () => {
    const call = beginMutation(ctx, args.region_name);
    assertResourceType(args.resource_data, args.resource_type);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({
      method: "POST",
      url: resourceUrl(endpoint, args.resource_type),
      region: call.region,
      body: args.resource_data,
    });
  });
}

export async function updateFhirResource(
  ctx: ToolContext,
  args: z.infer<typeof UpdateResourceInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("update_fhir_resource", async () => {
    const call = beginMutation(ctx, args.region_name);
    assertResourceType(args.resource_data, args.resource_type);
    const { id } = args.resource_data;
    if (id !== undefined && id !== args.resource_id) {
      throw new ValidationError(
        `Resource id mismatch: URL has ${args.resource_id}, resource_data has ${String(id)}`,
        [`id must be ${args.resource_id}`],
      );
    }
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({
      method: "PUT",
      url: resourceUrl(endpoint, args.resource_type, args.resource_id),
      region: call.region,
      body: { ...args.resource_data, id: args.resource_id },
    });
  });
}

export async function deleteFhirResource(
  ctx: ToolContext,
  args: z.infer<typeof ResourceRefInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("delete_fhir_resource", async () => {
    const call = beginMutation(ctx, args.region_name);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({
      method: "DELETE",
      url: resourceUrl(endpoint, args.resource_type, args.resource_id),
      region: call.region,
    });
  });
}

export async function patchFhirResource(
  ctx: ToolContext,
  args: z.infer<typeof PatchResourceInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("patch_fhir_resource", async () => {
    const call = beginMutation(ctx, args.region_name);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({
      method: "PATCH",
      url: resourceUrl(endpoint, args.resource_type, args.resource_id),
      region: call.region,
      body: args.patch_operations,
      headers: { "Content-Type": "application/json-patch+json" },
    });
  });
}

export async function getFhirResourceHistory(
  ctx: ToolContext,
  args: z.infer<typeof HistoryInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("get_fhir_resource_history", async () => {
    const call = beginCall(ctx, args.region_name);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    const query: QueryParams = {};
    if (args.count !== undefined) query._count = String(args.count);
    if (args.since) query._since = args.since;
    if (args.at) query._at = args.at;
    return ctx.execute({
      method: "GET",
      url: historyUrl(endpoint, args.resource_type, args.resource_id),
      region: call.region,
      query,
    });
  });
}

export async function getDatastoreCapabilities(
  ctx: ToolContext,
  args: z.infer<typeof CapabilitiesInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("get_datastore_capabilities", async () => {
    const call = beginCall(ctx, args.region_name);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({ method: "GET", url: metadataUrl(endpoint), region: call.region });
  });
}

/**
 * Wrap resources into a transaction or batch Bundle. Resources with an `id`
 * become PUT entries, the rest POST entries.
 */
export function buildBundle(resources: FhirResource[], type: Bundle["type"]): Bundle {
  const issues: string[] = [];
  const entry: BundleEntry[] = [];

  resources.forEach((resource, index) => {
    const { resourceType: rt, id } = resource;
    if (typeof rt !== "string" || rt.length === 0) {
      issues.push(`bundle_resources[${index}] is missing resourceType`);
      return;
    }
    entry.push({
      resource,
      request: typeof id === "string" && id.length > 0
        ? { method: "PUT", url: `${rt}/${id}` }
        : { method: "POST", url: rt },
    });
  });

  if (issues.length > 0) {
    throw new ValidationError(`Invalid bundle: ${issues.join("; ")}`, issues);
  }
  return { resourceType: "Bundle", type, entry };
}

export async function createFhirBundle(
  ctx: ToolContext,
  args: z.input<typeof BundleInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("create_fhir_bundle", async () => {
    const call = beginMutation(ctx, args.region_name);
    const bundle = buildBundle(args.bundle_resources, args.bundle_type ?? "transaction");
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({ method: "POST", url: endpoint, region: call.region, body: bundle });
  });
}

export async function searchFhirCompartment(
  ctx: ToolContext,
  args: z.infer<typeof CompartmentSearchInputSchema>,
): Promise<FhirResult> {
  return withErrorHandling("search_fhir_compartment", async () => {
    const call = beginCall(ctx, args.region_name);
    const endpoint = await endpointFor(ctx, call, args.datastore_id);
    return ctx.execute({
      method: "GET",
      url: compartmentUrl(endpoint, args.compartment_type, args.compartment_id, args.resource_type),
      region: call.region,
      query: args.query_parameters,
    });
  });
}
