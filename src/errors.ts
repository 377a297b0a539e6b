// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Base error class for all HealthLake MCP server errors.
 */
export class HealthLakeMcpError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HealthLakeMcpError";
    Object.setPrototypeOf(this, HealthLakeMcpError.prototype);
  }
}

/**
 * Thrown when a mutating tool is invoked while the server is in read-only mode.
 * Raised before any network call.
 */
export class PermissionDeniedError extends HealthLakeMcpError {
  constructor(message = "Operation not permitted: HealthLake MCP server is in read-only mode") {
    super(message);
    this.name = "PermissionDeniedError";
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

/**
 * Error thrown when a local precondition on a request fails
 * (resource type or id mismatch, malformed bundle entry).
 */
export class ValidationError extends HealthLakeMcpError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when the HealthLake management API fails.
 */
export class UpstreamControlPlaneError extends HealthLakeMcpError {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamControlPlaneError";
    this.code = code;
    Object.setPrototypeOf(this, UpstreamControlPlaneError.prototype);
  }
}

/**
 * Error thrown when the FHIR endpoint answers with an OperationOutcome.
 * `issues` holds one formatted line per outcome issue.
 */
export class FhirOperationError extends HealthLakeMcpError {
  readonly statusCode: number;
  readonly issues: string[];

  constructor(statusCode: number, issues: string[]) {
    super(`FHIR operation failed: ${issues.join("; ")}`);
    this.name = "FhirOperationError";
    this.statusCode = statusCode;
    this.issues = issues;
    Object.setPrototypeOf(this, FhirOperationError.prototype);
  }
}

/**
 * Error thrown for any other unsuccessful FHIR HTTP response.
 */
export class HttpError extends HealthLakeMcpError {
  readonly statusCode: number;
  readonly body: string;

  constructor(message: string, statusCode: number, body = "") {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.body = body;
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}
