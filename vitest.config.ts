import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["lib/codec/test/**/*.test.ts", "test/**/*.test.ts"],
    testTimeout: 20000,
  },
});
