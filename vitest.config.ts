import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.spec.ts"],
    env: {
      NODE_ENV: "test",
      JWT_ACCESS_SECRET: "test-secret-value-123"
    }
  }
});
