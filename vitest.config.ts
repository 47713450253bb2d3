import path from "path"
import { fileURLToPath } from "url"
import { defineConfig } from "vitest/config"

const root = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\/(.*)$/, replacement: `${root}/$1` }],
  },
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
  },
})
