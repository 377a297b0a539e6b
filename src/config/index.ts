// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { z } from "zod";

export const DEFAULT_REGION = "us-west-2";

const envSchema = z.object({
  AWS_REGION: z.string().optional(),
  HEALTHLAKE_MCP_READONLY: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
});

export type LogLevel = NonNullable<z.infer<typeof envSchema>["LOG_LEVEL"]>;

export type AppConfig = {
  /** Region used when a tool call names none. */
  defaultRegion: string;
  /** When true, every mutating tool is refused before any I/O. */
  readOnly: boolean;
  logLevel: LogLevel;
};

/**
 * `HEALTHLAKE_MCP_READONLY` is on only for the literal "true", in any case.
 * Surrounding whitespace is not stripped.
 */
export function isReadOnly(value: string | undefined): boolean {
  return (value ?? "false").toLowerCase() === "true";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const region = parsed.AWS_REGION?.trim();
  return {
    defaultRegion: region && region.length > 0 ? region : DEFAULT_REGION,
    readOnly: isReadOnly(parsed.HEALTHLAKE_MCP_READONLY),
    logLevel: parsed.LOG_LEVEL ?? "info",
  };
}
