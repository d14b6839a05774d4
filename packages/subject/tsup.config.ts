import { defineConfig } from "tsup";

export default defineConfig({
  format: ["esm"],
  entry: { index: "src/index.ts" },
  target: "node20",
  // resolved from the workspace at run time, not bundled
  external: ["@fanout/observable"],
  dts: true,
  clean: true,
  sourcemap: true,
});
