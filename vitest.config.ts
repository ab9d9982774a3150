import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(__dirname, "shared"),
    },
  },
  test: {
    environment: "node",
    include: ["server/**/__tests__/**/*.test.ts", "scripts/**/__tests__/**/*.test.ts"],
  },
});
