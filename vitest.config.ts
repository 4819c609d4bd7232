import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts", "src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
