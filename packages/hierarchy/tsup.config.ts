import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/server.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  noExternal: ["@codenav/core"],
  external: ["typescript"],
});
