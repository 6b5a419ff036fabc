import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["src/main.ts"],
  outDir: "dist",
  format: "esm",
  fixedExtension: true,
  platform: "node",
  // Workspace packages ship TypeScript sources, so they are bundled in.
  noExternal: [/^@xmobile\//],
  clean: true,
  sourcemap: false,
});
