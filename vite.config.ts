/// <reference types="vitest/config" />
import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'
import tailwindcss from '@tailwindcss/vite'
import checker from 'vite-plugin-checker'
import type { PluginOption } from 'vite'

// https://vite.dev/config/
export default defineConfig(() => {
  const isVitest = process.env.VITEST === 'true';
  const plugins: PluginOption[] = [react(), tailwindcss()];

  if (!isVitest) {
    plugins.push(checker({ typescript: true }));
  }

  return {
    plugins,
    // Render workers are ES modules (they import the trace core).
    worker: {
      format: 'es' as const,
    },
    // Expose only Vite-prefixed env vars to the client.
    envPrefix: ['VITE_'],
    server: {
      port: 43124,
      strictPort: true,
    },
    test: {
      globals: true,
      environment: 'jsdom',
      setupFiles: ['./tests/setup.ts'],
      include: ['tests/**/*.test.{ts,tsx}'],
      clearMocks: true,
    },
  };
});
