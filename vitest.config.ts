import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    // Subprocess tests spawn node; slow CI runners need the headroom
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
