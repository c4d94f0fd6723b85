import path from "node:path"
import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export default defineConfig({
  resolve: {
    alias: {
      "@sshbox/lib": path.resolve(__dirname, "../lib/src")
    }
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node"
  }
})
