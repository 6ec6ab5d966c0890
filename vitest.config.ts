import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Cross-package edge-case tests
      {
        extends: true,
        test: {
          name: "red-team",
          include: ["tests/**/*.test.ts"],
          globals: true,
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.d.ts", "**/*.test.ts"],
    },

    testTimeout: 30000,
  },
});
