import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  test: {
    name: "worker-outreach",
    root: __dirname,
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@layover/shared": path.resolve(__dirname, "../../packages/shared/src"),
      "@layover/registry": path.resolve(__dirname, "../../packages/registry/src"),
      "@layover/workflow-reconcile": path.resolve(__dirname, "../../workflows/reconcile/src"),
    },
  },
});
