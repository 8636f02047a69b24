import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/src/**/*.test.ts", "shared/src/**/*.test.ts"],
    testTimeout: 20_000,
  },
});
