import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    pool: "forks",
    // The default pool size follows `os.cpus()`, which can be huge on shared runners.
    poolOptions: {
      forks: {
        minForks: 1,
        maxForks: 4,
      },
    },
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "coverage",
      include: ["src/**/*.ts"],
      exclude: ["src/main.ts"],
    },
  },
});
