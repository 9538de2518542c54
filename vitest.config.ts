import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Type-only and barrel files
        "src/cluster/cluster-client.ts",
        "src/index.ts",
        "src/test/**",
      ],
    },
  },
});
