// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { DescribeFHIRDatastoreCommand, HealthLakeClient } from "@aws-sdk/client-healthlake";
import { UpstreamControlPlaneError } from "../errors.js";

/** The slice of the HealthLake SDK client the tools use. */
export type ControlPlaneClient = Pick<HealthLakeClient, "send">;

/** Builds a control-plane client for a region. */
export type ControlPlaneFactory = (region: string) => ControlPlaneClient;

/**
 * Create a HealthLake management client: three attempts, adaptive retry mode.
 */
export function createControlPlaneClient(region: string): HealthLakeClient {
  return new HealthLakeClient({
    region,
    maxAttempts: 3,
    retryMode: "adaptive",
  });
}

/**
 * Look up the FHIR base URL of a datastore.
 *
 * Not cached: every call issues a fresh `DescribeFHIRDatastore`. The returned
 * URL always ends with `/`.
 */
export async function resolveEndpoint(
  client: ControlPlaneClient,
  datastoreId: string,
): Promise<string> {
  const response = await client.send(
    new DescribeFHIRDatastoreCommand({ DatastoreId: datastoreId }),
  );
  const endpoint = response.DatastoreProperties?.DatastoreEndpoint;
  if (!endpoint) {
    throw new UpstreamControlPlaneError(
      `Datastore ${datastoreId} has no FHIR endpoint`,
      "MissingEndpoint",
    );
  }
  return endpoint.endsWith("/") ? endpoint : `${endpoint}/`;
}
