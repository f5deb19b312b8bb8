import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    installer: 'src/main/installer.ts',
    upgrader: 'src/main/upgrader.ts'
  },
  outDir: 'dist/bin',
  format: ['cjs'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: false,
  splitting: false
});
