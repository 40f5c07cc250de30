import { defineConfig } from 'tsup';

export default defineConfig((options) => ({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: options.watch ? false : {
    resolve: true,
  },
  tsconfig: '../../tsconfig.json',
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  external: [
    '@solana/codecs',
    '@solana/codecs-strings',
  ],
}));
