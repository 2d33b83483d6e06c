import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["sweepctl/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
  },
});
