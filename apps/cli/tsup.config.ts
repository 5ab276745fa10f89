import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Workspace packages export TypeScript sources, so bundle them in
  noExternal: [/^@reversi\//],

  banner: {
    js: "#!/usr/bin/env node",
  },

  esbuildOptions(options) {
    options.jsx = "automatic";
  },
});
