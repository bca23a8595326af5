import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    env: {
      // Keep the console quiet unless a test sets its own level.
      LOG_LEVEL: "error",
      // A zone with clock changes; grid slots must follow the wall clock.
      TZ: "Europe/London",
    },
    pool: "forks",
    testTimeout: 10000,
  },
});
