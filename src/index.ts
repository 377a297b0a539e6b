// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * healthlake-mcp-server - AWS HealthLake control-plane and FHIR data-plane
 * operations as Model Context Protocol tools.
 *
 * @packageDocumentation
 */

export { createHealthLakeServer, startStdioServer, registerHealthLakeTools, SERVER_NAME } from "./server/index.js";
export { createToolContext } from "./tools/context.js";
export type { ToolContext } from "./tools/context.js";
export { loadConfig, isReadOnly, DEFAULT_REGION } from "./config/index.js";
export type { AppConfig } from "./config/index.js";
export { checkMutationAllowed } from "./healthlake/guard.js";
export { createControlPlaneClient, resolveEndpoint } from "./healthlake/client.js";
export type { ControlPlaneClient, ControlPlaneFactory } from "./healthlake/client.js";
export { createFhirExecutor, formatOutcomeIssues } from "./fhir/executor.js";
export type { FhirExecutorOptions } from "./fhir/executor.js";
export { createPatientTemplate, createObservationTemplate } from "./fhir/templates.js";
export type { PatientTemplateInput, ObservationTemplateInput } from "./fhir/templates.js";
export { validateFhirResource } from "./fhir/validate.js";
export type { ValidationResult } from "./fhir/validate.js";
export { resourceUrl, historyUrl, compartmentUrl, metadataUrl } from "./fhir/url.js";
export type { FhirRequest, FhirResult, FhirExecutor, FhirResource, EmptySuccess } from "./fhir/types.js";

// Errors
export {
  HealthLakeMcpError,
  PermissionDeniedError,
  ValidationError,
  UpstreamControlPlaneError,
  FhirOperationError,
  HttpError,
} from "./errors.js";
