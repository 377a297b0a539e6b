// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ToolContext } from "../tools/context.js";
import { createDatastore, CreateDatastoreInputSchema, DatastoreIdInputSchema, deleteDatastore, describeDatastore, listDatastores, ListDatastoresInputSchema } from "../tools/datastores.js";
import {
  describeFhirExportJob,
  describeFhirImportJob,
  DescribeJobInputSchema,
  listFhirExportJobs,
  listFhirImportJobs,
  ListJobsInputSchema,
  startFhirExportJob,
  StartExportJobInputSchema,
  startFhirImportJob,
  StartImportJobInputSchema,
} from "../tools/jobs.js";
import { ListTagsInputSchema, listTagsForResource, tagResource, TagResourceInputSchema, untagResource, UntagResourceInputSchema } from "../tools/tags.js";
import {
  AdvancedSearchInputSchema,
  BundleInputSchema,
  CapabilitiesInputSchema,
  CompartmentSearchInputSchema,
  createFhirBundle,
  createFhirResource,
  CreateResourceInputSchema,
  deleteFhirResource,
  getDatastoreCapabilities,
  getFhirResourceHistory,
  HistoryInputSchema,
  patchFhirResource,
  PatchResourceInputSchema,
  readFhirResource,
  ReadResourceInputSchema,
  ResourceRefInputSchema,
  searchFhirCompartment,
  searchFhirResources,
  searchFhirResourcesAdvanced,
  SearchResourcesInputSchema,
  updateFhirResource,
  UpdateResourceInputSchema,
} from "../tools/resources.js";
import {
  observationTemplate,
  ObservationTemplateInputSchema,
  patientTemplate,
  PatientTemplateInputSchema,
  validateResource,
  ValidateResourceInputSchema,
} from "../tools/local.js";

/**
 * Render a tool's return value, or its failure, as an MCP tool result.
 * Failures were already logged by the tool's error wrapper.
 */
export async function toToolResult(run: () => unknown): Promise<CallToolResult> {
  try {
    const value = await run();
    return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { content: [{ type: "text", text: message }], isError: true };
  }
}

/**
 * Register every HealthLake tool on an MCP server.
 */
export function registerHealthLakeTools(server: McpServer, ctx: ToolContext): void {
  // Datastores
  server.tool("create_datastore", "Create a new HealthLake datastore.", CreateDatastoreInputSchema.shape,
    (args) => toToolResult(() => createDatastore(ctx, args)));
  server.tool("delete_datastore", "Delete a HealthLake datastore.", DatastoreIdInputSchema.shape,
    (args) => toToolResult(() => deleteDatastore(ctx, args)));
  server.tool("describe_datastore", "Describe a HealthLake datastore.", DatastoreIdInputSchema.shape,
    (args) => toToolResult(() => describeDatastore(ctx, args)));
  server.tool("list_datastores", "List HealthLake datastores.", ListDatastoresInputSchema.shape,
    (args) => toToolResult(() => listDatastores(ctx, args)));

  // Import/export jobs
  server.tool("start_fhir_import_job", "Start a FHIR import job from S3.", StartImportJobInputSchema.shape,
    (args) => toToolResult(() => startFhirImportJob(ctx, args)));
  server.tool("start_fhir_export_job", "Start a FHIR export job to S3.", StartExportJobInputSchema.shape,
    (args) => toToolResult(() => startFhirExportJob(ctx, args)));
  server.tool("describe_fhir_import_job", "Describe a FHIR import job.", DescribeJobInputSchema.shape,
    (args) => toToolResult(() => describeFhirImportJob(ctx, args)));
  server.tool("describe_fhir_export_job", "Describe a FHIR export job.", DescribeJobInputSchema.shape,
    (args) => toToolResult(() => describeFhirExportJob(ctx, args)));
  server.tool("list_fhir_import_jobs", "List FHIR import jobs of a datastore.", ListJobsInputSchema.shape,
    (args) => toToolResult(() => listFhirImportJobs(ctx, args)));
  server.tool("list_fhir_export_jobs", "List FHIR export jobs of a datastore.", ListJobsInputSchema.shape,
    (args) => toToolResult(() => listFhirExportJobs(ctx, args)));

  // Tags
  server.tool("tag_resource", "Add tags to a HealthLake resource.", TagResourceInputSchema.shape,
    (args) => toToolResult(() => tagResource(ctx, args)));
  server.tool("untag_resource", "Remove tags from a HealthLake resource.", UntagResourceInputSchema.shape,
    (args) => toToolResult(() => untagResource(ctx, args)));
  server.tool("list_tags_for_resource", "List tags of a HealthLake resource.", ListTagsInputSchema.shape,
    (args) => toToolResult(() => listTagsForResource(ctx, args)));

  // FHIR REST
  server.tool("read_fhir_resource", "Read a FHIR resource by ID, optionally a specific version.", ReadResourceInputSchema.shape,
    (args) => toToolResult(() => readFhirResource(ctx, args)));
  server.tool("search_fhir_resources", "Search for FHIR resources of one type.", SearchResourcesInputSchema.shape,
    (args) => toToolResult(() => searchFhirResources(ctx, args)));
  server.tool("search_fhir_resources_advanced", "Search FHIR resources with _include, _revinclude, _sort, _count and _elements.", AdvancedSearchInputSchema.shape,
    (args) => toToolResult(() => searchFhirResourcesAdvanced(ctx, args)));
  server.tool("create_fhir_resource", "Create a new FHIR resource.", CreateResourceInputSchema.shape,
    (args) => toToolResult(() => createFhirResource(ctx, args)));
  server.tool("update_fhir_resource", "Replace an existing FHIR resource.", UpdateResourceInputSchema.shape,
    (args) => toToolResult(() => updateFhirResource(ctx, args)));
  server.tool("delete_fhir_resource", "Delete a FHIR resource.", ResourceRefInputSchema.shape,
    (args) => toToolResult(() => deleteFhirResource(ctx, args)));
  server.tool("patch_fhir_resource", "Apply JSON Patch operations to a FHIR resource.", PatchResourceInputSchema.shape,
    (args) => toToolResult(() => patchFhirResource(ctx, args)));
  server.tool("get_fhir_resource_history", "Get the version history of a resource or resource type.", HistoryInputSchema.shape,
    (args) => toToolResult(() => getFhirResourceHistory(ctx, args)));
  server.tool("get_datastore_capabilities", "Get the datastore's FHIR CapabilityStatement.", CapabilitiesInputSchema.shape,
    (args) => toToolResult(() => getDatastoreCapabilities(ctx, args)));
  server.tool("create_fhir_bundle", "Submit resources as a transaction or batch Bundle.", BundleInputSchema.shape,
    (args) => toToolResult(() => createFhirBundle(ctx, args)));
  server.tool("search_fhir_compartment", "Search the resources in a compartment, e.g. everything for a Patient.", CompartmentSearchInputSchema.shape,
    (args) => toToolResult(() => searchFhirCompartment(ctx, args)));

  // Local helpers
  server.tool("create_patient_template", "Build a Patient resource body from basic demographics.", PatientTemplateInputSchema.shape,
    (args) => toToolResult(() => patientTemplate(args)));
  server.tool("create_observation_template", "Build an Observation resource body.", ObservationTemplateInputSchema.shape,
    (args) => toToolResult(() => observationTemplate(args)));
  server.tool("validate_fhir_resource", "Check a FHIR resource for its resourceType and required fields.", ValidateResourceInputSchema.shape,
    (args) => toToolResult(() => validateResource(args)));
}
