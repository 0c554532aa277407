import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  external: ['@logsink/adapters-log-sqlite', '@logsink/adapters-pino', 'pino', 'pino-abstract-transport'],
  treeshake: true,
  splitting: false,
});
