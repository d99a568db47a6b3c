import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@qcalc/expr",
    globals: true,
    environment: "node",
  },
});
