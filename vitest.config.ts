import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // Frame rendering and worker forks are slow on small CI machines.
    testTimeout: 30000,
  },
});
