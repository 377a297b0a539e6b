// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Minimal FHIR R4 shapes used by the request executor and the local tools.
 */

/** Any FHIR resource: an open JSON object with a `resourceType` discriminator. */
export type FhirResource = Record<string, unknown> & { resourceType?: unknown };

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/** Query parameters; an array value repeats the key. */
export type QueryParams = Record<string, string | string[]>;

/**
 * One signed FHIR REST call.
 */
export interface FhirRequest {
  method: HttpMethod;
  /** Absolute URL, without query string */
  url: string;
  /** Region used to scope the request signature */
  region: string;
  /** JSON body, serialized as-is */
  body?: unknown;
  query?: QueryParams;
  /** Extra headers; these win over the FHIR content-negotiation defaults */
  headers?: Record<string, string>;
}

/** Returned for a successful response that has no body. */
export interface EmptySuccess {
  status: "success";
  statusCode: number;
}

/** Decoded JSON body of a successful response, or {@link EmptySuccess}. */
export type FhirResult = Record<string, unknown>;

/** Sends a {@link FhirRequest} and normalizes the outcome. */
export type FhirExecutor = (request: FhirRequest) => Promise<FhirResult>;

export interface OperationOutcomeIssue {
  severity?: string;
  code?: string;
  details?: { text?: string };
  diagnostics?: string;
}

export interface OperationOutcome {
  resourceType: "OperationOutcome";
  issue?: OperationOutcomeIssue[];
}

export interface Coding {
  system?: string;
  code?: string;
  display?: string;
}

export interface CodeableConcept {
  coding?: Coding[];
  text?: string;
}

export interface Quantity {
  value?: number;
  unit?: string;
  system?: string;
  code?: string;
}

export interface HumanName {
  use?: string;
  family?: string;
  given?: string[];
}

export interface ContactPoint {
  system?: "phone" | "email";
  value?: string;
  use?: string;
}

export interface Identifier {
  system?: string;
  value?: string;
}

export interface Address {
  use?: string;
  line?: string[];
  city?: string;
  state?: string;
  postalCode?: string;
  country?: string;
}

export interface BundleEntry {
  resource: FhirResource;
  request: { method: "POST" | "PUT"; url: string };
}

export type BundleType = "transaction" | "batch";

export interface Bundle {
  resourceType: "Bundle";
  type: BundleType;
  entry: BundleEntry[];
}
