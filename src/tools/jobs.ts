// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * FHIR bulk import/export job tools (control plane).
 */

import { z } from "zod";
import {
  DescribeFHIRExportJobCommand,
  DescribeFHIRImportJobCommand,
  ListFHIRExportJobsCommand,
  ListFHIRImportJobsCommand,
  StartFHIRExportJobCommand,
  StartFHIRImportJobCommand,
} from "@aws-sdk/client-healthlake";
import { beginCall, beginMutation, datastoreId, regionName, withoutMetadata, type ToolContext } from "./context.js";
import { toDate } from "./datastores.js";
import { withErrorHandling } from "./errors.js";

const s3OutputConfig = z.object({
  S3Configuration: z.object({
    S3Uri: z.string().min(1),
    KmsKeyId: z.string().min(1),
  }),
});

const dataAccessRoleArn = z
  .string()
  .min(1)
  .describe("The ARN that gives HealthLake access permission to the S3 locations");

export const StartImportJobInputSchema = z.object({
  input_data_config: z.object({ S3Uri: z.string().min(1) }).describe("Where the import data lives"),
  job_output_data_config: s3OutputConfig.describe("Where the import job writes its output"),
  datastore_id: datastoreId,
  data_access_role_arn: dataAccessRoleArn,
  job_name: z.string().optional(),
  client_token: z.string().optional(),
  region_name: regionName,
});

export const StartExportJobInputSchema = z.object({
  output_data_config: s3OutputConfig.describe("Where the export job writes its output"),
  datastore_id: datastoreId,
  data_access_role_arn: dataAccessRoleArn,
  job_name: z.string().optional(),
  client_token: z.string().optional(),
  region_name: regionName,
});

export const DescribeJobInputSchema = z.object({
  datastore_id: datastoreId,
  job_id: z.string().min(1).describe("The AWS-generated job ID"),
  region_name: regionName,
});

export const ListJobsInputSchema = z.object({
  datastore_id: datastoreId,
  next_token: z.string().optional(),
  max_results: z.number().int().min(1).max(500).optional(),
  job_name: z.string().optional(),
  job_status: z.enum(["SUBMITTED", "IN_PROGRESS", "COMPLETED_WITH_ERRORS", "COMPLETED", "FAILED"]).optional(),
  submitted_before: z.string().datetime().optional().describe("ISO 8601 timestamp"),
  submitted_after: z.string().datetime().optional().describe("ISO 8601 timestamp"),
  region_name: regionName,
});

type ListJobsArgs = z.infer<typeof ListJobsInputSchema>;

export async function startFhirImportJob(
  ctx: ToolContext,
  args: z.infer<typeof StartImportJobInputSchema>,
) {
  return withErrorHandling("start_fhir_import_job", async () => {
    const call = beginMutation(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new StartFHIRImportJobCommand({
        InputDataConfig: args.input_data_config,
        JobOutputDataConfig: args.job_output_data_config,
        DatastoreId: args.datastore_id,
        DataAccessRoleArn: args.data_access_role_arn,
        JobName: args.job_name,
        ClientToken: args.client_token,
      }),
    );
    return withoutMetadata("start_fhir_import_job", output);
  });
}

export async function startFhirExportJob(
  ctx: ToolContext,
  args: z.infer<typeof StartExportJobInputSchema>,
) {
  return withErrorHandling("start_fhir_export_job", async () => {
    const call = beginMutation(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new StartFHIRExportJobCommand({
        OutputDataConfig: args.output_data_config,
        DatastoreId: args.datastore_id,
        DataAccessRoleArn: args.data_access_role_arn,
        JobName: args.job_name,
        ClientToken: args.client_token,
      }),
    );
    return withoutMetadata("start_fhir_export_job", output);
  });
}

export async function describeFhirImportJob(
  ctx: ToolContext,
  args: z.infer<typeof DescribeJobInputSchema>,
) {
  return withErrorHandling("describe_fhir_import_job", async () => {
    const call = beginCall(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new DescribeFHIRImportJobCommand({ DatastoreId: args.datastore_id, JobId: args.job_id }),
    );
    return withoutMetadata("describe_fhir_import_job", output);
  });
}

export async function describeFhirExportJob(
  ctx: ToolContext,
  args: z.infer<typeof DescribeJobInputSchema>,
) {
  return withErrorHandling("describe_fhir_export_job", async () => {
    const call = beginCall(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new DescribeFHIRExportJobCommand({ DatastoreId: args.datastore_id, JobId: args.job_id }),
    );
    return withoutMetadata("describe_fhir_export_job", output);
  });
}

function listJobsInput(args: ListJobsArgs) {
  return {
    DatastoreId: args.datastore_id,
    NextToken: args.next_token,
    MaxResults: args.max_results,
    JobName: args.job_name,
    JobStatus: args.job_status,
    SubmittedBefore: toDate(args.submitted_before),
    SubmittedAfter: toDate(args.submitted_after),
  };
}

export async function listFhirImportJobs(ctx: ToolContext, args: ListJobsArgs) {
  return withErrorHandling("list_fhir_import_jobs", async () => {
    const call = beginCall(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new ListFHIRImportJobsCommand(listJobsInput(args)),
    );
    return withoutMetadata("list_fhir_import_jobs", output);
  });
}

export async function listFhirExportJobs(ctx: ToolContext, args: ListJobsArgs) {
  return withErrorHandling("list_fhir_export_jobs", async () => {
    const call = beginCall(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new ListFHIRExportJobsCommand(listJobsInput(args)),
    );
    return withoutMetadata("list_fhir_export_jobs", output);
  });
}
