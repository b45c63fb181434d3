import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/src/**/__tests__/**/*.test.ts", "backend/src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
