import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    server: {
      deps: {
        // clipanion's .mjs build uses extensionless directory imports that
        // Node's ESM loader rejects; let Vite resolve it instead.
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/program.ts",
        "src/cli/commands/serve.ts",
        "src/config/types.ts",
        "src/analytics/types.ts",
        "src/conversations/types.ts",
        "src/usage/types.ts",
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
});
