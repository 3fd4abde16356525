import { defineConfig } from "vite"

// CLI 以 Node SSR 模式打包，依赖保持外部引用
export default defineConfig({
  build: {
    ssr: "src/cli.ts",
    outDir: "dist",
    target: "node20",
    rollupOptions: {
      output: {
        entryFileNames: "cli.js",
        banner: "#!/usr/bin/env node",
      },
    },
  },
})
