import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    pool: "forks",
    env: {
      DUSK_LOG_LEVEL: "silent",
    },
  },
});
