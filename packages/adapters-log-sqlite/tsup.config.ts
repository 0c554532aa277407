import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  external: ['@logsink/core', '@logsink/adapters-sqlite', '@logsink/adapters-pino', 'better-sqlite3'],
  treeshake: true,
  splitting: false,
});
