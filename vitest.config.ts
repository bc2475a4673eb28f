import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/**/*.test.ts", "server/**/*.test.ts"],
    testTimeout: 20_000,
  },
});
