import path from 'node:path';
import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

/** 页面通过 /api 代理访问去背景服务（service/standalone.ts） */
const serviceUrl = process.env.BG_REMOVER_SERVICE_URL ?? 'http://127.0.0.1:19816';
const proxy = { '/api': { target: serviceUrl, changeOrigin: true } };

// https://vitejs.dev/config/
export default defineConfig({
  server: {
    port: 5173,
    host: '127.0.0.1', // 显式绑定，避免 localhost 解析问题
    proxy,
  },
  preview: {
    port: 4173,
    host: '127.0.0.1',
    proxy,
  },
  resolve: {
    alias: {
      '@': path.join(__dirname, 'src'),
    },
  },
  plugins: [react()],
  build: {
    outDir: 'dist',
  },
  clearScreen: false,
});
