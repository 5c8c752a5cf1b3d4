import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    // Main entry point (namespaces + named exports)
    index: "src/index.ts",

    // =========================================================================
    // Granular entry points
    // =========================================================================
    result: "src/result.ts",
    option: "src/option.ts",
    errors: "src/errors.ts",
    functional: "src/functional/index.ts",
  },
  format: ["cjs", "esm"],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
  // toString renders constructor names
  keepNames: true,
});
