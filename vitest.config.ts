import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import * as path from 'path';

const root = path.dirname(fileURLToPath(import.meta.url));

const packages = [
  'types', 'crypto', 'fhe', 'coprocessor', 'access',
  'ledger', 'optimizer', 'metrics', 'reveal', 'sdk',
];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@cloakroom/${pkg}`] = path.resolve(root, `packages/${pkg}/src/index.ts`);
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts'],
      reporter: ['text', 'text-summary'],
    },
  },
});
