import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    pool: "forks",
    // Sleeps are injected, so nothing here should come near the default timeout.
    testTimeout: 10_000,
  },
});
