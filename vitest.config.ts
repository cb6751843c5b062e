import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      // Resolve @newsdesk/shared to its source so vitest can follow its deps
      "@newsdesk/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    server: {
      deps: {
        inline: [/^@newsdesk\//, "zod"],
      },
    },
  },
});
