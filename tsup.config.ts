import { defineConfig } from "tsup";

export const entry = {
  index: "src/index.ts",
  server: "src/server/index.ts",
  cli: "src/cli/index.ts",
};

export default defineConfig({
  entry,
  format: ["esm"],
  dts: true,
  clean: true,
  sourcemap: true,
  splitting: true,
  treeshake: true,
  minify: false,
  target: "node20",
});
