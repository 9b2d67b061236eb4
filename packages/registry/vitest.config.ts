import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    name: "registry",
    root: __dirname,
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@layover/shared": path.resolve(__dirname, "../shared/src"),
    },
  },
});
