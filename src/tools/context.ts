// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { z } from "zod";
import type { MetadataBearer } from "@smithy/types";
import { loadConfig, type AppConfig } from "../config/index.js";
import { createControlPlaneClient, resolveEndpoint, type ControlPlaneFactory } from "../healthlake/client.js";
import { checkMutationAllowed } from "../healthlake/guard.js";
import { createFhirExecutor } from "../fhir/executor.js";
import type { FhirExecutor } from "../fhir/types.js";
import { logger } from "../observability/logger.js";

/**
 * Everything a tool needs from the outside world.
 */
export interface ToolContext {
  /** Current settings; called once per tool invocation, never cached. */
  settings: () => AppConfig;
  controlPlane: ControlPlaneFactory;
  execute: FhirExecutor;
}

/**
 * Build a context wired to the real AWS clients, with optional overrides.
 *
 * @example
 * ```ts
 * const ctx = createToolContext({ settings: () => ({ ...loadConfig(), readOnly: true }) });
 * ```
 */
export function createToolContext(overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    settings: overrides.settings ?? (() => loadConfig()),
    controlPlane: overrides.controlPlane ?? createControlPlaneClient,
    execute: overrides.execute ?? createFhirExecutor(),
  };
}

/** Shared `region_name` parameter of every tool. */
export const regionName = z
  .string()
  .optional()
  .describe("AWS region name (defaults to the AWS_REGION env var or us-west-2)");

/** Shared `datastore_id` parameter. */
export const datastoreId = z.string().min(1).describe("The AWS-generated ID for the datastore");

/**
 * Per-call view of the context: settings read once, region resolved.
 */
export interface ToolCall {
  config: AppConfig;
  region: string;
}

export function beginCall(ctx: ToolContext, region: string | undefined): ToolCall {
  const config = ctx.settings();
  // hosts send "" for an unset optional field
  const requested = region?.trim();
  return { config, region: requested ? requested : config.defaultRegion };
}

/**
 * Same as {@link beginCall}, then refuses the call in read-only mode.
 */
export function beginMutation(ctx: ToolContext, region: string | undefined): ToolCall {
  const call = beginCall(ctx, region);
  checkMutationAllowed(call.config);
  return call;
}

/** Resolve the datastore's FHIR base URL with a fresh control-plane client. */
export function endpointFor(ctx: ToolContext, call: ToolCall, id: string): Promise<string> {
  return resolveEndpoint(ctx.controlPlane(call.region), id);
}

/**
 * Drop the SDK's `$metadata` from a command output, logging its request id.
 */
export function withoutMetadata<T extends MetadataBearer>(
  operation: string,
  output: T,
): Omit<T, "$metadata"> {
  const { $metadata, ...rest } = output;
  logger.debug({ operation, requestId: $metadata.requestId }, "HealthLake call completed");
  return rest;
}
