// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Command } from "commander";
import { existsSync, readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { registerServeCommand } from "./serve.js";
import { registerValidateCommand } from "./validate.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export function getVersion(): string {
  // Bundled in dist/ the package root is one level up, from src/cli two.
  const pkgPath = [resolve(__dirname, "..", "package.json"), resolve(__dirname, "..", "..", "package.json")]
    .find((candidate) => existsSync(candidate));
  if (pkgPath === undefined) return "0.0.0";
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, "utf8")) as { version: string };
    return pkg.version;
  } catch {
    return "0.0.0";
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("healthlake-mcp-server")
    .description("MCP server exposing AWS HealthLake datastores and FHIR REST operations as tools")
    .version(getVersion());

  registerServeCommand(program, getVersion());
  registerValidateCommand(program);

  return program;
}
