import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Source imports use NodeNext-style '.js' suffixes; load the '.ts' file instead
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.endsWith('.js') && source.startsWith('.') && importer && !importer.includes('node_modules')) {
          return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/*.test.ts'],
    globals: true,
    pool: 'forks',
  },
});
