import { readFileSync } from "node:fs";
import { defineConfig } from "tsup";

// Read version from package.json at build time
const pkg: unknown = JSON.parse(
  readFileSync(new URL("./package.json", import.meta.url), "utf-8")
);
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

export default defineConfig({
  entry: ["src/index.tsx"],
  format: ["esm"],
  dts: false,
  clean: true,
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: false,
  minify: false,
  treeshake: true,
  shims: true,
  outExtension() {
    return { js: ".mjs" };
  },
  banner: {
    // Provide CJS compatibility for bundled dependencies that use require()
    js: `import { createRequire } from 'module';const require = createRequire(import.meta.url);`,
  },

  // Workspace packages ship TypeScript sources, so they are bundled in
  noExternal: ["@rewind/core", "@rewind/shared"],

  external: [/^node:/, "react", "ink", "ink-spinner", "commander", "simple-git"],

  esbuildOptions(options) {
    options.jsx = "automatic";
    options.jsxImportSource = "react";
    options.define = {
      ...options.define,
      __VERSION__: JSON.stringify(version),
    };
  },
});
