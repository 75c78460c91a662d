import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Contracted functions report the name of the function they wrap.
  // Vite's built-in esbuild step forces `keepNames: false`, so TypeScript is
  // transformed here instead, with names kept.
  esbuild: false,
  plugins: [
    {
      name: 'esbuild-keep-names',
      async transform(code, id) {
        if (!/\.[cm]?tsx?$/.test(id.split('?')[0] ?? id)) return null;
        const result = await transformWithEsbuild(code, id, {
          target: 'esnext',
          keepNames: true,
        });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
  },
});
