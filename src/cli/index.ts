#!/usr/bin/env node
// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * CLI entry point for the HealthLake MCP server.
 *
 * Usage: healthlake-mcp-server [serve|validate] [options]
 */

import { createProgram } from "./program.js";
import { logger } from "../observability/logger.js";

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    logger.fatal({ err }, "healthlake-mcp-server failed");
    process.exitCode = 1;
  });
