import { defineConfig } from "tsup";

// Workspace packages ship TypeScript sources, so they are bundled in.
export default defineConfig({
  entry: ["src/server.ts"],
  format: ["esm"],
  clean: true,
  sourcemap: true,
  noExternal: [/^@typegraph\//],
});
