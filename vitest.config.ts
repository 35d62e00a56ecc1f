import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["__tests__/**/*.test.ts", "hourcast/**/__tests__/**/*.test.ts", "logging/**/__tests__/**/*.test.ts"],
  },
});
