import { defineConfig } from "vitest/config";

const isCI = !!process.env.CI;

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    // CI: git-backed tests build throw-away repositories, give slow runners room
    ...(isCI && { retry: 2, testTimeout: 30_000 }),
    setupFiles: ["./tests/vitest.setup.ts"],
    exclude: [
      "**/node_modules/**",
      "**/build/**",
      "**/dist/**",
      "**/.worktrees/**",
    ],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "build/",
        "dist/",
        "**/*.test.ts",
        "**/*.spec.ts",
        "vitest.config.ts",
        "src/index.ts",
        // Re-export files (no executable code to test)
        "src/code/git/index.ts",
        "src/code/ledger/index.ts",
        "src/code/pipeline/index.ts",
        "src/code/emitter/index.ts",
        "src/code/filters/index.ts",
        // Type-only files (no executable code to test)
        "src/code/git/types.ts",
        "src/code/ledger/types.ts",
        "src/code/pipeline/types.ts",
        // Test utilities (not production code)
        "tests/helpers/**",
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 80,
        statements: 90,
        "src/code/ledger/ownership-table.ts": {
          lines: 100,
          functions: 100,
          branches: 90,
          statements: 100,
        },
      },
    },
  },
});
