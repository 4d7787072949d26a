import { defineConfig } from 'vitest/config';
import { existsSync } from 'fs';
import { join } from 'path';
import dotenv from 'dotenv';

const envPath = join(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/bin.ts'],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
