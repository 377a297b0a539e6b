// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Sha256 } from "@aws-crypto/sha256-js";
import { fromNodeProviderChain } from "@aws-sdk/credential-providers";
import { HttpRequest } from "@smithy/protocol-http";
import { buildQueryString } from "@smithy/querystring-builder";
import { SignatureV4 } from "@smithy/signature-v4";
import type { AwsCredentialIdentity, AwsCredentialIdentityProvider, QueryParameterBag } from "@smithy/types";
import { FhirOperationError, HttpError } from "../errors.js";
import { logger } from "../observability/logger.js";
import type { FhirExecutor, FhirRequest, FhirResult, OperationOutcomeIssue } from "./types.js";

/** SigV4 service name of the HealthLake data plane. */
export const SIGNING_SERVICE = "healthlake";

const FHIR_JSON = "application/fhir+json";

/**
 * Options for {@link createFhirExecutor}.
 */
export interface FhirExecutorOptions {
  /** Signing credentials. Defaults to the Node.js provider chain. */
  credentials?: AwsCredentialIdentity | AwsCredentialIdentityProvider;
  /** HTTP transport. Defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

/**
 * Create the authenticated FHIR request executor.
 *
 * Each call signs the request with SigV4 for the HealthLake service in the
 * request's region, sends it once and normalizes the response:
 *
 * - 2xx with a body: the decoded JSON object
 * - 2xx without a body: `{ status: "success", statusCode }`
 * - OperationOutcome error body: {@link FhirOperationError}
 * - any other failure: {@link HttpError}
 *
 * No retries happen here; retry policy belongs to the caller.
 *
 * @example
 * ```ts
 * const execute = createFhirExecutor();
 * const patient = await execute({
 *   method: "GET",
 *   url: "https://healthlake.us-east-1.amazonaws.com/datastore/abc/r4/Patient/42",
 *   region: "us-east-1",
 * });
 * ```
 */
export function createFhirExecutor(options: FhirExecutorOptions = {}): FhirExecutor {
  const credentials = options.credentials ?? fromNodeProviderChain();
  const transport = options.fetch ?? fetch;

  return async (request: FhirRequest): Promise<FhirResult> => {
    const url = new URL(request.url);
    const body = request.body === undefined ? undefined : JSON.stringify(request.body);

    const signer = new SignatureV4({
      credentials,
      region: request.region,
      service: SIGNING_SERVICE,
      sha256: Sha256,
    });
    const signed = await signer.sign(
      new HttpRequest({
        method: request.method,
        protocol: url.protocol,
        hostname: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        path: url.pathname,
        query: mergeQuery(url.searchParams, request.query),
        headers: { ...mergeHeaders(request.headers), host: url.host },
        body,
      }),
    );

    // fetch derives Host from the URL itself.
    const headers = new Headers(signed.headers);
    headers.delete("host");

    const queryString = buildQueryString(signed.query ?? {});
    const target = `${url.origin}${url.pathname}${queryString ? `?${queryString}` : ""}`;

    logger.debug({ method: request.method, url: target }, "Sending FHIR request");
    const response = await transport(target, {
      method: signed.method,
      headers,
      body,
    });
    const text = await response.text();

    if (response.ok) {
      if (text.length === 0) {
        return { status: "success", statusCode: response.status };
      }
      const decoded = parseJson(text);
      if (!isJsonObject(decoded)) {
        throw new HttpError(
          `Unexpected FHIR response body (HTTP ${response.status}): ${text}`,
          response.status,
          text,
        );
      }
      return decoded;
    }

    throw toResponseError(response, target, text);
  };
}

/**
 * Merge caller headers over the FHIR defaults. Names are lowercased so a
 * caller's `content-type` replaces the default `Content-Type`.
 */
export function mergeHeaders(headers: Record<string, string> = {}): Record<string, string> {
  const merged: Record<string, string> = {
    "content-type": FHIR_JSON,
    accept: FHIR_JSON,
  };
  for (const [name, value] of Object.entries(headers)) {
    merged[name.toLowerCase()] = value;
  }
  return merged;
}

/**
 * Flatten OperationOutcome issues into `"<SEVERITY>: <code> - <details>"` lines.
 */
export function formatOutcomeIssues(issues: OperationOutcomeIssue[]): string[] {
  return issues.map((issue) => {
    const severity = (issue.severity ?? "unknown").toUpperCase();
    const code = issue.code ?? "unknown";
    const details = issue.details?.text ?? issue.diagnostics ?? "No details";
    return `${severity}: ${code} - ${details}`;
  });
}

/** Decoded JSON, or `undefined` when `text` is not JSON. */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function toResponseError(response: Response, url: string, text: string): Error {
  const decoded = parseJson(text);
  if (decoded === undefined) {
    return new HttpError(
      `HTTP ${response.status} ${response.statusText} for url: ${url}`,
      response.status,
      text,
    );
  }

  if (isJsonObject(decoded) && decoded.resourceType === "OperationOutcome") {
    const issues = Array.isArray(decoded.issue) ? decoded.issue.filter(isJsonObject).map(toIssue) : [];
    return new FhirOperationError(response.status, formatOutcomeIssues(issues));
  }
  return new HttpError(`HTTP error ${response.status}: ${text}`, response.status, text);
}

function toIssue(raw: Record<string, unknown>): OperationOutcomeIssue {
  const details = isJsonObject(raw.details) ? raw.details : undefined;
  return {
    severity: optionalString(raw.severity),
    code: optionalString(raw.code),
    details: details ? { text: optionalString(details.text) } : undefined,
    diagnostics: optionalString(raw.diagnostics),
  };
}

function mergeQuery(
  fromUrl: URLSearchParams,
  query: Record<string, string | string[]> = {},
): QueryParameterBag {
  const bag: Record<string, string | string[]> = {};
  for (const key of new Set(fromUrl.keys())) {
    const values = fromUrl.getAll(key);
    bag[key] = values.length === 1 ? values[0] ?? "" : values;
  }
  for (const [key, value] of Object.entries(query)) {
    bag[key] = value;
  }
  return bag;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
