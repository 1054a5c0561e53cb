import { defineConfig } from "vitest/config";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/__tests__/**/*.test.ts"],
    alias: Object.fromEntries(
      fs
        .readdirSync(path.resolve(root, "src"), { withFileTypes: true })
        .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith("__"))
        .map((dirent) => [
          dirent.name,
          path.resolve(root, `./src/${dirent.name}`),
        ]),
    ),
    benchmark: {
      include: ["src/**/__benches__/**/*.bench.ts"],
    },
  },
});
