import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    name: "workflow-reconcile",
    root: __dirname,
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@layover/shared": path.resolve(__dirname, "../../packages/shared/src"),
    },
  },
});
