import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/cli/index.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'bundle',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: false,
    // The entry file carries its own shebang, which esbuild preserves.
});
