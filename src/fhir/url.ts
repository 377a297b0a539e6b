// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * URL builders. `endpoint` is a datastore base URL ending in `/`, as
 * returned by `resolveEndpoint`.
 */

export function resourceUrl(endpoint: string, resourceType: string, resourceId?: string): string {
  return resourceId === undefined
    ? `${endpoint}${resourceType}`
    : `${endpoint}${resourceType}/${resourceId}`;
}

/** `{type}/_history`, `{type}/{id}/_history` or `{type}/{id}/_history/{vid}` */
export function historyUrl(
  endpoint: string,
  resourceType: string,
  resourceId?: string,
  versionId?: string,
): string {
  const base = `${resourceUrl(endpoint, resourceType, resourceId)}/_history`;
  return versionId === undefined ? base : `${base}/${versionId}`;
}

export function compartmentUrl(
  endpoint: string,
  compartmentType: string,
  compartmentId: string,
  resourceType?: string,
): string {
  const base = `${endpoint}${compartmentType}/${compartmentId}`;
  return resourceType === undefined ? base : `${base}/${resourceType}`;
}

export function metadataUrl(endpoint: string): string {
  return `${endpoint}metadata`;
}
