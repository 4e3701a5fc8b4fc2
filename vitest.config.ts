import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["metactl/test/**/*.test.ts"],
    testTimeout: 20_000,
  },
});
