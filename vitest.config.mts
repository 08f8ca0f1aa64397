import react from '@vitejs/plugin-react';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [react()],
  test: {
    environment: 'jsdom',
    globals: true,
    include: ['frontend/tests/**/*.test.{ts,tsx}'],
    setupFiles: ['frontend/vitest.setup.ts'],
  },
});
