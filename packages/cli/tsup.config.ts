import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  clean: true,
  sourcemap: true,
  // Workspace packages export TypeScript sources, so they are bundled in.
  noExternal: [/^@clicky\//],
});
