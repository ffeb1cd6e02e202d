import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node', // Use node environment
    globals: true, // Enable globals like describe, it, expect
    isolate: true, // Run tests in separate worker processes
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist']
  }
});
