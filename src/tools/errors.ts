// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { UpstreamControlPlaneError } from "../errors.js";
import { logger } from "../observability/logger.js";

/** The fields every AWS SDK service exception carries. */
interface AwsServiceError extends Error {
  $fault: "client" | "server";
  $metadata: { httpStatusCode?: number; requestId?: string };
}

export function isAwsServiceError(err: unknown): err is AwsServiceError {
  return err instanceof Error && "$metadata" in err && "$fault" in err;
}

/**
 * Run one tool operation with the shared failure handling.
 *
 * AWS service exceptions are logged and rethrown as
 * {@link UpstreamControlPlaneError} with the message
 * `"AWS HealthLake Error (<code>): <message>"`. Anything else is logged
 * with the operation name and rethrown unchanged.
 */
export async function withErrorHandling<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isAwsServiceError(err)) {
      const code = err.name || "Unknown";
      logger.error(
        { operation, code, requestId: err.$metadata.requestId },
        `AWS ClientError: ${code} - ${err.message}`,
      );
      throw new UpstreamControlPlaneError(
        `AWS HealthLake Error (${code}): ${err.message}`,
        code,
        { cause: err },
      );
    }
    logger.error({ operation, err }, `Error in ${operation}: ${err instanceof Error ? err.message : String(err)}`);
    throw err;
  }
}
