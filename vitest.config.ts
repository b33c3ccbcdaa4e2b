import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.spec.ts"],
    environment: "node",
    env: { LOG_QUIET: "1" },
    testTimeout: 10_000,
  },
});
