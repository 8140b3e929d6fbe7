import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

/**
 * Vitest configuration.
 *
 * Component tests run in jsdom; text measurement, element rects and timers
 * are stubbed per test.
 */
export default defineConfig({
  plugins: [react()],
  test: {
    environment: 'jsdom',
    include: ['client/src/**/__tests__/**/*.test.{ts,tsx}'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['./client/src/test/setup.ts'],
    reporters: 'default',
    env: {
      VITE_LOG_LEVEL: 'silent',
    },
  },
});
