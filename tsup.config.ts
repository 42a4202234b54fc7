import { defineConfig } from 'tsup';

/**
 * Bundled build (ESM only; `npm run build` emits the unbundled tree)
 *
 * Dependencies stay external and resolve from node_modules.
 */
export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'cli/loadtest': 'src/cli/loadtest.ts',
  },

  format: ['esm'],

  dts: false,

  splitting: false,

  sourcemap: true,

  clean: true,

  external: ['eventemitter3', 'js-yaml', 'pino', 'ts-results', 'zod'],

  target: 'node20',

  platform: 'node',

  minify: false,

  treeshake: true,

  // config/loadtest.yaml ships through the package.json "files" field
});
