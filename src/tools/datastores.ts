// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Datastore lifecycle tools (control plane).
 */

import { z } from "zod";
import {
  CreateFHIRDatastoreCommand,
  DeleteFHIRDatastoreCommand,
  DescribeFHIRDatastoreCommand,
  ListFHIRDatastoresCommand,
} from "@aws-sdk/client-healthlake";
import { beginCall, beginMutation, datastoreId, regionName, withoutMetadata, type ToolContext } from "./context.js";
import { withErrorHandling } from "./errors.js";
import { tagList } from "./tags.js";

export const CreateDatastoreInputSchema = z.object({
  datastore_type_version: z.enum(["R4"]).describe("The FHIR version of the datastore"),
  datastore_name: z.string().optional().describe("User-generated name for the datastore"),
  sse_configuration: z
    .object({
      KmsEncryptionConfig: z.object({
        CmkType: z.enum(["CUSTOMER_MANAGED_KMS_KEY", "AWS_OWNED_KMS_KEY"]),
        KmsKeyId: z.string().optional(),
      }),
    })
    .optional()
    .describe("Server-side encryption configuration"),
  preload_data_config: z
    .object({ PreloadDataType: z.enum(["SYNTHEA"]) })
    .optional()
    .describe("Preload data upon creation"),
  client_token: z.string().optional().describe("Idempotency token"),
  tags: tagList.optional().describe("Tags to apply to the datastore"),
  identity_provider_configuration: z
    .object({
      AuthorizationStrategy: z.enum(["SMART_ON_FHIR_V1", "AWS_AUTH"]),
      FineGrainedAuthorizationEnabled: z.boolean().optional(),
      Metadata: z.string().optional(),
      IdpLambdaArn: z.string().optional(),
    })
    .optional()
    .describe("Identity provider configuration"),
  region_name: regionName,
});

export const DatastoreIdInputSchema = z.object({
  datastore_id: datastoreId,
  region_name: regionName,
});

export const ListDatastoresInputSchema = z.object({
  filter: z
    .object({
      DatastoreName: z.string().optional(),
      DatastoreStatus: z.enum(["CREATING", "ACTIVE", "DELETING", "DELETED"]).optional(),
      CreatedBefore: z.string().datetime().optional(),
      CreatedAfter: z.string().datetime().optional(),
    })
    .optional()
    .describe("Filter to apply to the datastore list; dates are ISO 8601"),
  next_token: z.string().optional().describe("Token for pagination"),
  max_results: z.number().int().min(1).max(500).optional().describe("Maximum number of results"),
  region_name: regionName,
});

export async function createDatastore(
  ctx: ToolContext,
  args: z.infer<typeof CreateDatastoreInputSchema>,
) {
  return withErrorHandling("create_datastore", async () => {
    const call = beginMutation(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new CreateFHIRDatastoreCommand({
        DatastoreTypeVersion: args.datastore_type_version,
        DatastoreName: args.datastore_name,
        SseConfiguration: args.sse_configuration,
        PreloadDataConfig: args.preload_data_config,
        ClientToken: args.client_token,
        Tags: args.tags,
        IdentityProviderConfiguration: args.identity_provider_configuration,
      }),
    );
    return withoutMetadata("create_datastore", output);
  });
}

export async function deleteDatastore(
  ctx: ToolContext,
  args: z.infer<typeof DatastoreIdInputSchema>,
) {
  return withErrorHandling("delete_datastore", async () => {
    const call = beginMutation(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new DeleteFHIRDatastoreCommand({ DatastoreId: args.datastore_id }),
    );
    return withoutMetadata("delete_datastore", output);
  });
}

export async function describeDatastore(
  ctx: ToolContext,
  args: z.infer<typeof DatastoreIdInputSchema>,
) {
  return withErrorHandling("describe_datastore", async () => {
    const call = beginCall(ctx, args.region_name);
    const output = await ctx.controlPlane(call.region).send(
      new DescribeFHIRDatastoreCommand({ DatastoreId: args.datastore_id }),
    );
    return withoutMetadata("describe_datastore", output);
  });
}

export async function listDatastores(
  ctx: ToolContext,
  args: z.infer<typeof ListDatastoresInputSchema>,
) {
  return withErrorHandling("list_datastores", async () => {
    const call = beginCall(ctx, args.region_name);
    const filter = args.filter
      ? {
          DatastoreName: args.filter.DatastoreName,
          DatastoreStatus: args.filter.DatastoreStatus,
          CreatedBefore: toDate(args.filter.CreatedBefore),
          CreatedAfter: toDate(args.filter.CreatedAfter),
        }
      : undefined;
    const output = await ctx.controlPlane(call.region).send(
      new ListFHIRDatastoresCommand({
        Filter: filter,
        NextToken: args.next_token,
        MaxResults: args.max_results,
      }),
    );
    return withoutMetadata("list_datastores", output);
  });
}

export function toDate(value: string | undefined): Date | undefined {
  return value === undefined ? undefined : new Date(value);
}
