import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  dts: true,
  clean: true,
  sourcemap: true,
  splitting: false,
  esbuildOptions(options) {
    // Type names default to class names, so they must survive bundling.
    options.keepNames = true;
  },
});
