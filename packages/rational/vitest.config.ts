import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@qcalc/rational",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
