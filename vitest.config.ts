import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/*/tests/**/*.test.ts",
      "synthesizer/tests/**/*.spec.ts",
      "web-runner/tests/**/*.spec.ts",
      "orchestrator/tests/**/*.test.ts",
    ],
    environment: "node",
  },
});
