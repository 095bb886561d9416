import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/gateway/**/*.test.ts"],
    restoreMocks: true,
    clearMocks: true,
    testTimeout: 20_000,
  },
});
