import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["explorer/src/**/*.test.ts", "explorer-server/src/**/*.test.ts"],
    environment: "node",
  },
});
