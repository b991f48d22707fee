import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["installer/src/**/*.test.ts"],
    environment: "node",
  },
});
