import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "extensions/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
    unstubGlobals: true,
  },
});
