// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { loadConfig } from "../config/index.js";
import { startStdioServer } from "../server/index.js";
import { createToolContext } from "../tools/context.js";

export function registerServeCommand(program: Command, version: string): void {
  program
    .command("serve", { isDefault: true })
    .description("Serve the HealthLake tools over stdio (default)")
    .option("--region <region>", "Default AWS region (overrides AWS_REGION)")
    .option("--read-only", "Refuse every mutating tool (same as HEALTHLAKE_MCP_READONLY=true)")
    .action(async (opts: { region?: string; readOnly?: boolean }) => {
      const context = createToolContext({
        settings: () => {
          const config = loadConfig();
          return {
            ...config,
            defaultRegion: opts.region ?? config.defaultRegion,
            readOnly: opts.readOnly === true || config.readOnly,
          };
        },
      });
      await startStdioServer({ version, context });
    });
}
