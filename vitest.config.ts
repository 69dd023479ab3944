import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    pool: "threads",
    // Console spies are set up per test
    restoreMocks: true,
    include: ["src/**/*.test.ts"],
  },
});
