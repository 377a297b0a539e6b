// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { AppConfig } from "../config/index.js";
import { PermissionDeniedError } from "../errors.js";

/**
 * Refuse a state-changing operation when the server runs read-only.
 *
 * Must be the first call of every tool that creates, updates, deletes,
 * imports, exports, tags or untags, so a refused call has no side effect.
 */
export function checkMutationAllowed(config: Pick<AppConfig, "readOnly">): void {
  if (config.readOnly) {
    throw new PermissionDeniedError();
  }
}
