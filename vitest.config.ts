import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // workspace packages resolve to their TypeScript sources
    conditions: ["source"],
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
  },
});
