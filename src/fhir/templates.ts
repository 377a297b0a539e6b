// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * Resource template builders: shorthand input to a FHIR R4 resource body,
 * ready to pass to `create_fhir_resource`.
 */

import type { Address, CodeableConcept, ContactPoint, FhirResource, Identifier, Quantity } from "./types.js";

export const OBSERVATION_CATEGORY_SYSTEM =
  "http://terminology.hl7.org/CodeSystem/observation-category";

export interface PatientTemplateInput {
  family: string;
  given: string[];
  gender?: "male" | "female" | "other" | "unknown";
  /** YYYY-MM-DD */
  birthDate?: string;
  identifier?: { system?: string; value: string };
  phone?: string;
  email?: string;
  address?: Address;
}

export interface ObservationTemplateInput {
  /** e.g. "Patient/123" */
  patientReference: string;
  code: { system: string; code: string; display?: string };
  status?: "registered" | "preliminary" | "final" | "amended";
  valueQuantity?: Quantity;
  valueString?: string;
  /** Code from the observation-category system, e.g. "vital-signs" */
  category?: string;
  effectiveDateTime?: string;
}

export function createPatientTemplate(input: PatientTemplateInput): FhirResource {
  const patient: FhirResource = {
    resourceType: "Patient",
    name: [{ use: "official", family: input.family, given: input.given }],
  };

  if (input.gender) patient.gender = input.gender;
  if (input.birthDate) patient.birthDate = input.birthDate;

  if (input.identifier) {
    const identifier: Identifier = { value: input.identifier.value };
    if (input.identifier.system) identifier.system = input.identifier.system;
    patient.identifier = [identifier];
  }

  const telecom: ContactPoint[] = [];
  if (input.phone) telecom.push({ system: "phone", value: input.phone, use: "home" });
  if (input.email) telecom.push({ system: "email", value: input.email, use: "home" });
  if (telecom.length > 0) patient.telecom = telecom;

  const address = definedEntries(input.address ?? {});
  if (Object.keys(address).length > 0) {
    patient.address = [{ use: "home", ...address }];
  }

  return patient;
}

export function createObservationTemplate(input: ObservationTemplateInput): FhirResource {
  const code: CodeableConcept = {
    coding: [
      {
        system: input.code.system,
        code: input.code.code,
        ...(input.code.display ? { display: input.code.display } : {}),
      },
    ],
  };
  if (input.code.display) code.text = input.code.display;

  const observation: FhirResource = {
    resourceType: "Observation",
    status: input.status ?? "final",
    code,
    subject: { reference: input.patientReference },
  };

  if (input.category) {
    observation.category = [
      { coding: [{ system: OBSERVATION_CATEGORY_SYSTEM, code: input.category }] },
    ];
  }
  if (input.effectiveDateTime) observation.effectiveDateTime = input.effectiveDateTime;

  // value[x] is a choice type: one of them at most
  if (input.valueQuantity) {
    observation.valueQuantity = input.valueQuantity;
  } else if (input.valueString !== undefined) {
    observation.valueString = input.valueString;
  }

  return observation;
}

function definedEntries(value: Address): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}
