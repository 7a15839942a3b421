import { transform } from 'esbuild';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's own esbuild transform forces keepNames off, which renames
  // shadowing function expressions (function search -> search2). Tests
  // assert on Function.name, so transform TypeScript with keepNames on.
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      async transform(code, id) {
        if (!/\.[cm]?ts$/.test(id.split('?')[0])) return null;
        const result = await transform(code, {
          loader: 'ts',
          format: 'esm',
          target: 'es2022',
          keepNames: true,
          sourcemap: true,
          sourcefile: id,
        });
        return { code: result.code, map: result.map };
      },
    },
  ],
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
