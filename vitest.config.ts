import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      DB_PATH: ":memory:",
      API_KEY: "test-api-key",
      MOCK_AGENT: "1",
      SERVICE_VERSION: "1.0.0",
    },
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "./src"),
    },
  },
});
