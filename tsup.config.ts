import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    cli: 'src/cli.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  minify: false,
  external: ['node-ansiparser', 'node-pty', 'ssh2'],
  banner: {
    js: '/* termexpect - expect-style automation for terminals */',
  },
});
