import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "."),
    },
  },
  test: {
    environment: "node",
    include: ["__tests__/**/*.test.ts"],
    env: {
      DATABASE_PATH: ":memory:",
      SESSION_SECRET: "test-secret",
      STEAM_API_KEY: "test-steam-key",
      OPENROUTER_API_KEY: "test-openrouter-key",
    },
  },
});
