import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["__test__/**/*.test.ts"],
    environment: "node",
    env: {
      LUCID_LOG_LEVEL: "silent",
    },
  },
});
