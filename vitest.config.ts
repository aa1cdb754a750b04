import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // process.chdir is unavailable in worker threads
    pool: "forks",
    include: ["src/**/*.test.ts"],
  },
});
