// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { entry } from "../tsup.config.js";
import { getVersion } from "../src/cli/program.js";

const root = fileURLToPath(new URL("..", import.meta.url));
const pkg = JSON.parse(readFileSync(`${root}package.json`, "utf8")) as {
  version: string;
  bin: Record<string, string>;
  exports: Record<string, { import: string; types: string }>;
};

describe("build configuration", () => {
  it("points every bundle entry at an existing source file", () => {
    for (const source of Object.values(entry)) {
      expect(existsSync(`${root}${source}`), source).toBe(true);
    }
  });

  it("installs the CLI bundle as the bin", () => {
    expect(entry.cli).toBe("src/cli/index.ts");
    expect(pkg.bin["healthlake-mcp-server"]).toBe("./dist/cli.js");
  });

  it("exports the index and server bundles", () => {
    expect(pkg.exports["."]).toEqual({ types: "./dist/index.d.ts", import: "./dist/index.js" });
    expect(pkg.exports["./server"]).toEqual({ types: "./dist/server.d.ts", import: "./dist/server.js" });
  });

  it("reports the package version from the sources", () => {
    expect(getVersion()).toBe(pkg.version);
  });
});
