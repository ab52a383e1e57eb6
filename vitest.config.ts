import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import tsconfigPaths from 'vite-tsconfig-paths';

const root = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    globals: true,
    env: {
      NODE_ENV: 'test'
    },
    include: [
      'core/**/*.test.ts',
      'services/**/*.test.ts',
      'interpreter/**/*.test.ts',
      'cli/**/*.test.ts',
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],
    alias: {
      '@core': root('./core'),
      '@services': root('./services'),
      '@interpreter': root('./interpreter'),
      '@cli': root('./cli'),
      '@tests': root('./tests')
    }
  }
});
