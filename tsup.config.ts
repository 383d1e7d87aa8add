import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs", "esm"], // Output both CommonJS and ES modules
  dts: true,
  sourcemap: true,
  clean: true,
});
