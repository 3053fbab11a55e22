import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';

const siteDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  // Served from the theme's static assets, next to the generated pages
  base: process.env.VITE_BASE_URL ? `${process.env.VITE_BASE_URL}/js/` : '/js/',
  build: {
    outDir: `${siteDir}public/js`,
    emptyOutDir: true,
    lib: {
      entry: `${siteDir}src/main.ts`,
      name: 'site',
      formats: ['iife'],
      fileName: () => 'site.js',
    },
  },
  server: {
    port: 5173,
  },
});
