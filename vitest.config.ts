import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "ebnf-parsegen",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
