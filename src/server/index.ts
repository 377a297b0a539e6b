// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createToolContext, type ToolContext } from "../tools/context.js";
import { logger } from "../observability/logger.js";
import { registerHealthLakeTools } from "./tools.js";

export const SERVER_NAME = "AWS HealthLake MCP Server";

/**
 * Create an MCP server exposing every HealthLake tool.
 *
 * @example
 * ```ts
 * const server = createHealthLakeServer({ version: "1.0.0" });
 * await server.connect(new StdioServerTransport());
 * ```
 */
export function createHealthLakeServer(options: { version: string; context?: ToolContext }): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: options.version });
  registerHealthLakeTools(server, options.context ?? createToolContext());
  return server;
}

/**
 * Serve the tools over stdio until the host closes the stream.
 */
export async function startStdioServer(options: { version: string; context?: ToolContext }): Promise<McpServer> {
  const server = createHealthLakeServer(options);
  await server.connect(new StdioServerTransport());
  logger.info({ version: options.version }, `${SERVER_NAME} running on stdio`);
  return server;
}

export { registerHealthLakeTools, toToolResult } from "./tools.js";
