import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "hierarchy",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 15000,
    globals: true,
  },
});
