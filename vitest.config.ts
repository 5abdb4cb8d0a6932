import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["weft-*/tests/**/*.test.ts"],
    exclude: ["node_modules", "dist", "**/*.d.ts"],
    testTimeout: 20000,
    restoreMocks: true,
    unstubEnvs: true,
    unstubGlobals: true,
  },
});
