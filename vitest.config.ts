import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/index.ts"],
      thresholds: {
        // Curve and arithmetic carry the pool's value
        "src/curve.ts": {
          statements: 95,
          branches: 85,
          functions: 95,
        },
        "src/fixed-point.ts": {
          statements: 95,
          branches: 90,
          functions: 100,
        },
      },
    },
  },
});
