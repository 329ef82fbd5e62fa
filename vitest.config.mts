// vitest.config.mts
//
// Vitest configuration for initex.
// - Node environment; the engine has no DOM code
// - Coverage via V8
// - Path aliases via tsconfig (and a direct @ → src alias)

import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  // Reads path aliases from tsconfig.json.
  plugins: [tsconfigPaths()],

  resolve: {
    alias: {
      // For imports such as "@/core/scanner"
      "@": resolve(__dirname, "src"),
    },
  },

  test: {
    globals: true,
    environment: "node",

    include: ["tests/**/*.spec.ts"],

    exclude: [
      "node_modules",
      "dist",
      "coverage",
      "examples/**",
      "benchmarks/**",
    ],

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],

      include: ["src/**/*.ts"],

      exclude: [
        "src/**/*.d.ts",
        "src/index.ts", // re-exports only
      ],

      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    clearMocks: true,
    restoreMocks: true,
  },
});
