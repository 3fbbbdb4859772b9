import path from 'path';
import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import tailwindcss from '@tailwindcss/vite';

// https://vitejs.dev/config/
export default defineConfig({
  plugins: [
    react({
      jsxRuntime: 'automatic',
      jsxImportSource: 'react',
    }),
    tailwindcss(),
  ],
  build: {
    outDir: path.resolve(__dirname, '../backend/src/static/web-widget'),
    emptyOutDir: false,
    cssCodeSplit: false,
    sourcemap: false,
    rollupOptions: {
      input: path.resolve(__dirname, 'src/widget.tsx'),
      output: {
        format: 'iife',
        name: 'SupportChatWidget',
        entryFileNames: 'support-chat-widget.js',
        inlineDynamicImports: true,
        compact: true,
        assetFileNames: (assetInfo) => {
          if (assetInfo.name?.endsWith('.css')) {
            return 'support-chat-widget.css';
          }
          return assetInfo.name || 'asset';
        },
      },
    },
  },
});
