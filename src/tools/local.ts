// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Tools that run locally and make no AWS call.
 */

import { z } from "zod";
import { createObservationTemplate, createPatientTemplate } from "../fhir/templates.js";
import type { FhirResource } from "../fhir/types.js";
import { validateFhirResource, type ValidationResult } from "../fhir/validate.js";

export const PatientTemplateInputSchema = z.object({
  family_name: z.string().min(1).describe("Family (last) name"),
  given_names: z.array(z.string().min(1)).min(1).describe("Given names, in order"),
  gender: z.enum(["male", "female", "other", "unknown"]).optional(),
  birth_date: z.string().regex(/^\d{4}(-\d{2}(-\d{2})?)?$/).optional().describe("YYYY, YYYY-MM or YYYY-MM-DD"),
  identifier_system: z.string().optional().describe("Identifier namespace, e.g. an MRN system URI"),
  identifier_value: z.string().optional(),
  phone: z.string().optional(),
  email: z.string().optional(),
  address_line: z.array(z.string()).optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  postal_code: z.string().optional(),
  country: z.string().optional(),
});

export const ObservationTemplateInputSchema = z.object({
  patient_reference: z.string().min(1).describe("Subject reference, e.g. Patient/123"),
  code_system: z.string().min(1).describe("Code system URI, e.g. http://loinc.org"),
  code_value: z.string().min(1),
  code_display: z.string().optional(),
  status: z.enum(["registered", "preliminary", "final", "amended"]).optional(),
  value_quantity: z
    .object({
      value: z.number().optional(),
      unit: z.string().optional(),
      system: z.string().optional(),
      code: z.string().optional(),
    })
    .optional(),
  value_string: z.string().optional(),
  category_code: z.string().optional().describe("Observation category, e.g. vital-signs or laboratory"),
  effective_date_time: z.string().optional(),
});

export const ValidateResourceInputSchema = z.object({
  resource_data: z.record(z.unknown()).describe("The FHIR resource to check"),
  expected_resource_type: z.string().optional().describe("Fail if resourceType differs from this"),
});

export function patientTemplate(args: z.infer<typeof PatientTemplateInputSchema>): FhirResource {
  return createPatientTemplate({
    family: args.family_name,
    given: args.given_names,
    gender: args.gender,
    birthDate: args.birth_date,
    identifier: args.identifier_value
      ? { system: args.identifier_system, value: args.identifier_value }
      : undefined,
    phone: args.phone,
    email: args.email,
    address: {
      line: args.address_line,
      city: args.city,
      state: args.state,
      postalCode: args.postal_code,
      country: args.country,
    },
  });
}

export function observationTemplate(args: z.infer<typeof ObservationTemplateInputSchema>): FhirResource {
  return createObservationTemplate({
    patientReference: args.patient_reference,
    code: { system: args.code_system, code: args.code_value, display: args.code_display },
    status: args.status,
    valueQuantity: args.value_quantity,
    valueString: args.value_string,
    category: args.category_code,
    effectiveDateTime: args.effective_date_time,
  });
}

export function validateResource(args: z.infer<typeof ValidateResourceInputSchema>): ValidationResult {
  return validateFhirResource(args.resource_data, args.expected_resource_type);
}
