import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.{test,spec}.ts"],
    environment: "node",
    env: {
      LOG_TO_DB: "0",
      LOG_LEVEL: "error",
    },
  },
});
