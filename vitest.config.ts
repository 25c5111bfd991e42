import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const SRC_DIR = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: [{ find: /^#\/(.*)$/, replacement: `${SRC_DIR}/$1` }],
  },
});
