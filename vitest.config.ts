import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        // Resolve .js imports to .ts source files (bundler-style)
        if (source.endsWith('.js') && importer && !source.includes('node_modules')) {
          const tsSource = source.replace(/\.js$/, '.ts');
          return this.resolve(tsSource, importer, { skipSelf: true });
        }
      },
    },
  ],
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 20000,
    hookTimeout: 20000,
  },
});
