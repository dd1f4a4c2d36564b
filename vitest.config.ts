import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@core": fromRoot("./src/core/index.ts"),
      "@services": fromRoot("./src/core/services"),
      "@domain": fromRoot("./src/core/domain"),
      "@lib": fromRoot("./src/core/lib"),
      "@cli": fromRoot("./src/cli"),
      "@test": fromRoot("./src/test")
    }
  },
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: 30_000
  }
});
