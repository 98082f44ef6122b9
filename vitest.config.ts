import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "server/src/**/__tests__/**/*.test.mts",
      "share/shared-schema/src/**/__tests__/**/*.test.mts",
      "collector-js/src/**/__tests__/**/*.test.mts",
    ],
    env: {
      LOG_SILENT: "true",
    },
  },
});
