import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/**/src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      JWT_SECRET: "test-secret-value-0123456789",
      DATABASE_PATH: ":memory:",
      AUDIT_LOG: "false"
    }
  }
});
