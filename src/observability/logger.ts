// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import pino from "pino";
import { loadConfig } from "../config/index.js";

// stdout carries the MCP stream; logs go to stderr.
export const logger = pino(
  {
    name: "healthlake-mcp-server",
    level: loadConfig().logLevel,
  },
  pino.destination(2),
);
