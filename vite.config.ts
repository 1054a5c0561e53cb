import { defineConfig, type Plugin } from "vite";
import dts from "vite-plugin-dts";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const root = fileURLToPath(new URL(".", import.meta.url));

/**
 * Replace __DEV__ with a runtime process.env check so consumers'
 * bundlers can tree-shake dev-only code paths.
 */
function replaceDevGlobals(): Plugin {
  return {
    name: "replace-dev-globals",
    transform(code, id) {
      if (id.includes("node_modules")) return null;
      const result = code.replace(
        /\b__DEV__\b/g,
        'process.env.NODE_ENV !== "production"',
      );
      return result !== code ? result : null;
    },
  };
}

/** Bare-specifier alias for every top-level source directory (tests excluded). */
function sourceDirAliases(dir: string): Record<string, string> {
  return Object.fromEntries(
    fs
      .readdirSync(path.resolve(dir, "src"), { withFileTypes: true })
      .filter((dirent) => dirent.isDirectory() && !dirent.name.startsWith("__"))
      .map((dirent) => [dirent.name, path.resolve(dir, `./src/${dirent.name}`)]),
  );
}

// https://vite.dev/config/
export default defineConfig(({ command }) => ({
  plugins: [
    ...(command === "build"
      ? [replaceDevGlobals(), dts({ tsconfigPath: "./tsconfig.build.json" })]
      : []),
  ],

  define:
    command === "build"
      ? {}
      : {
          __DEV__: "true",
        },

  resolve: {
    alias: sourceDirAliases(root),
  },

  build: {
    target: "es2022",
    lib: {
      entry: path.resolve(root, "src/index.ts"),
      formats: ["es", "cjs"],
      fileName: (format) => (format === "es" ? "index.js" : "index.cjs"),
    },
  },
}));
