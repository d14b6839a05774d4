import { defineConfig } from "tsup";

export default defineConfig({
  format: ["esm"],
  entry: { index: "src/index.ts" },
  target: "node20",
  dts: true,
  clean: true,
  sourcemap: true,
});
