// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Structural field-presence checks. Not a conformance validator.
 */

/** Required top-level fields per resource type (choice types excluded). */
export const REQUIRED_FIELDS: Readonly<Record<string, readonly string[]>> = {
  Observation: ["status", "code"],
  Condition: ["subject"],
  Encounter: ["status", "class"],
  Procedure: ["status", "subject"],
  DiagnosticReport: ["status", "code"],
  MedicationRequest: ["status", "intent", "subject"],
  AllergyIntolerance: ["patient"],
  Immunization: ["status", "vaccineCode", "patient"],
  Bundle: ["type"],
};

export interface ValidationResult {
  valid: boolean;
  issues: string[];
  resourceType: string | null;
}

export function validateFhirResource(
  resource: Record<string, unknown>,
  expectedType?: string,
): ValidationResult {
  const issues: string[] = [];
  const resourceType = typeof resource.resourceType === "string" && resource.resourceType.length > 0
    ? resource.resourceType
    : null;

  if (resourceType === null) {
    issues.push("Missing required 'resourceType' field");
    return { valid: false, issues, resourceType };
  }

  if (expectedType && resourceType !== expectedType) {
    issues.push(`Resource type mismatch: expected ${expectedType}, got ${resourceType}`);
  }

  for (const field of REQUIRED_FIELDS[resourceType] ?? []) {
    if (isMissing(resource[field])) {
      issues.push(`Missing required field '${field}' for ${resourceType}`);
    }
  }

  return { valid: issues.length === 0, issues, resourceType };
}

function isMissing(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}
