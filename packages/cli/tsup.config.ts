import { readFileSync } from "node:fs";
import { defineConfig } from "tsup";

// Read version from package.json at build time
const pkg: unknown = JSON.parse(readFileSync(new URL("./package.json", import.meta.url), "utf-8"));
const pkgVersion =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0-dev";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: false,
  minify: false,
  treeshake: true,
  outExtension() {
    return { js: ".mjs" };
  },
  banner: {
    // Provide CJS compatibility for bundled dependencies that use require()
    js: `import { createRequire } from 'module';const require = createRequire(import.meta.url);`,
  },

  // Workspace packages export TypeScript sources, so they are bundled in
  noExternal: ["@tierlink/backend", "@tierlink/core", "@tierlink/shared"],

  external: [/^node:/],

  esbuildOptions(options) {
    // Inject version from package.json at build time
    options.define = {
      ...options.define,
      __VERSION__: JSON.stringify(pkgVersion),
    };
  },
});
