/**
 * 去背景服务 - 独立 Node 构建
 * 输出纯 Node 可执行脚本: node dist-service/index.js
 */
import path from 'node:path';
import { defineConfig } from 'vite';

export default defineConfig({
  build: {
    outDir: 'dist-service',
    emptyOutDir: true,
    target: 'node20',
    lib: {
      entry: path.resolve(__dirname, 'service/standalone.ts'),
      formats: ['es'],
      fileName: () => 'index.js',
    },
    rollupOptions: {
      external: ['onnxruntime-node', 'sharp', /^node:/],
      output: {
        format: 'esm',
        inlineDynamicImports: true,
      },
    },
    sourcemap: true,
    minify: false,
  },
});
