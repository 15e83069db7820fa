import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const dir = (relative: string) => fileURLToPath(new URL(relative, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@core$/, replacement: dir("./src/core/index.ts") },
      { find: /^@domain\/(.*)$/, replacement: `${dir("./src/core/domain")}/$1` },
      { find: /^@lib\/(.*)$/, replacement: `${dir("./src/core/lib")}/$1` },
      { find: /^@render\/(.*)$/, replacement: `${dir("./src/core/render")}/$1` },
      { find: /^@panel\/(.*)$/, replacement: `${dir("./src/core/panel")}/$1` },
      { find: /^@services\/(.*)$/, replacement: `${dir("./src/core/services")}/$1` },
      { find: /^@cli\/(.*)$/, replacement: `${dir("./src/cli")}/$1` },
      { find: /^@test\/(.*)$/, replacement: `${dir("./src/test")}/$1` },
    ],
  },
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
})
