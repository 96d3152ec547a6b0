import { defineConfig } from "tsdown";

export default defineConfig([
  {
    entry: ["./src/index.ts"],
    platform: "node",
    dts: true,
    sourcemap: true,
  },
  {
    entry: ["./ops/schemas/index.ts"],
    platform: "node",
    dts: true,
    sourcemap: true,
    outDir: "dist/ops",
  },
]);
