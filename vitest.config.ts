import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tools/mcp/tag-scout/src/__tests__/**/*.test.ts"],
    environment: "node",
    pool: "forks",
  },
});
