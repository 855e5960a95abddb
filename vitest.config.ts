import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // each file boots its own in-process postgres
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
