import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/_tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
  },
});
