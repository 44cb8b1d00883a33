import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@\//, replacement: fromRoot("./src/") },
      { find: /^~shared\//, replacement: fromRoot("./deps/shared/src/") },
      { find: /^~test\//, replacement: fromRoot("./test/") },
    ],
  },
  test: {
    include: ["test/**/*.test.ts", "deps/shared/test/**/*.test.ts"],
    fileParallelism: false,
  },
});
