import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Plain Node: the panel talks to scsynth over UDP, there is no DOM
    environment: "node",
    globals: true,
    include: ["src/**/*.{test,spec}.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.d.ts",
        "src/main.ts",
      ],
    },
  },
});
