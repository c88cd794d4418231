import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Tests run against an in-memory Postgres (pg-mem); logs stay silent.
    env: {
      NODE_ENV: "test",
    },
    pool: "forks",
    testTimeout: 10000,
  },
});
