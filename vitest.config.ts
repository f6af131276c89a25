import { defineConfig } from "vitest/config";
import path from "path";

const packageSrc = (name: string) => path.resolve(__dirname, "packages", name, "src");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.spec.ts"],
    testTimeout: 15000
  },
  resolve: {
    alias: [
      { find: "@joulegate/shared", replacement: packageSrc("shared") },
      { find: "@joulegate/logger", replacement: packageSrc("logger") },
      { find: "@joulegate/agent", replacement: packageSrc("agent") },
      { find: "@joulegate/ledger", replacement: packageSrc("ledger") },
      { find: "@joulegate/orchestrator", replacement: packageSrc("orchestrator") }
    ]
  }
});
