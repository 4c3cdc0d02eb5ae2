import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // Tool tests chdir into a sandbox, which worker threads do not allow.
    pool: "forks",
  },
});
