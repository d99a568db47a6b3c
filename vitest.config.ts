import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Root package: config, logging, CLI driver
      {
        extends: true,
        test: {
          name: "qcalc",
          include: ["tests/**/*.test.ts"],
          globals: true,
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
  },
});
