import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import dts from 'vite-plugin-dts';

export default defineConfig({
  // `using` declarations need lowering below esnext.
  esbuild: {
    target: 'es2022',
  },
  build: {
    target: 'es2022',
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'SsaJs',
      fileName: (format) => `ssa-js.${format}.js`,
      formats: ['es', 'cjs'],
    },
    rollupOptions: {
      external: ['@hamk-uas/jax-js-nonconsuming', 'ml-matrix', 'winston', 'zod'],
      output: {},
    },
  },
  plugins: [
    dts({ insertTypesEntry: true, include: ['src'] }),
  ],
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 30_000,
  },
});
