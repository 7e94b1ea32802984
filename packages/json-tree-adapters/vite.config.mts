import { fileURLToPath } from "node:url"
import { defineConfig } from "vite"
import dts from "vite-plugin-dts"

const resolvePath = (str: string) => fileURLToPath(new URL(str, import.meta.url))

const external = ["fast-deep-equal", "immer", "lossless-json", "winston", "yjs"]

export default defineConfig({
  build: {
    target: "node20",
    lib: {
      entry: resolvePath("./src/index.ts"),
      name: "json-tree-adapters",
    },
    sourcemap: "inline",
    minify: false,

    rollupOptions: {
      external,

      output: [
        {
          format: "esm",
          entryFileNames: "json-tree-adapters.esm.mjs",
        },
      ],
    },
  },
  plugins: [
    dts({
      tsconfigPath: resolvePath("../../tsconfig.json"),
      outDir: resolvePath("./dist/types"),
      include: ["src"],
    }),
  ],
})
