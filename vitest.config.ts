import { defineConfig } from "vitest/config";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    alias: {
      // Resolve workspace package names straight to their sources so tests
      // never need a build first.
      "@pulsewatch/core": resolve(__dirname, "packages/core/src/index.ts"),
      "@pulsewatch/plugin-source-jsonl-log": resolve(
        __dirname,
        "packages/plugins/source-jsonl-log/src/index.ts",
      ),
      "@pulsewatch/plugin-source-file-mtime": resolve(
        __dirname,
        "packages/plugins/source-file-mtime/src/index.ts",
      ),
      "@pulsewatch/plugin-source-git-commit": resolve(
        __dirname,
        "packages/plugins/source-git-commit/src/index.ts",
      ),
      "@pulsewatch/plugin-sink-webhook": resolve(
        __dirname,
        "packages/plugins/sink-webhook/src/index.ts",
      ),
    },
  },
});
