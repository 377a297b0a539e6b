// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { readFileSync } from "node:fs";
import { isJsonObject } from "../fhir/executor.js";
import { validateFhirResource } from "../fhir/validate.js";

export function registerValidateCommand(program: Command): void {
  program
    .command("validate <file>")
    .description("Check a FHIR resource JSON file for its resourceType and required fields")
    .option("--type <resourceType>", "Expected resource type")
    .option("--json", "Output results as JSON")
    .action((file: string, opts: { type?: string; json?: boolean }) => {
      try {
        const content: unknown = JSON.parse(readFileSync(file, "utf8"));
        const result = isJsonObject(content)
          ? validateFhirResource(content, opts.type)
          : { valid: false, issues: ["Root value is not a JSON object"], resourceType: null };

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else if (result.valid) {
          console.log(`\x1b[32m✓ Valid ${result.resourceType ?? ""}\x1b[0m`);
        } else {
          console.error(`\x1b[31m✗ ${result.issues.length} issue(s)\x1b[0m`);
          for (const issue of result.issues) {
            console.error(`  \x1b[31m• ${issue}\x1b[0m`);
          }
        }

        process.exitCode = result.valid ? 0 : 1;
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      }
    });
}
