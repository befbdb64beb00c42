import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "types",
    include: ["tests/**/*.test.ts"],
  },
});
