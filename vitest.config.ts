import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/src/**/*.test.ts", "worker/src/**/*.test.ts"],
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
