import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["slack-bot/src/**/*.test.ts"],
    environment: "node",
  },
});
