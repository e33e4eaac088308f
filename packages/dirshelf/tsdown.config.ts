import { defineConfig } from 'tsdown';

export default defineConfig({
    entry: ['src/index.ts'],
    format: 'esm',
    target: 'node20',
    outDir: 'dist',
    clean: true,
    // Bundle all @dirshelf/* packages and pure JS deps
    noExternal: [
        /^@dirshelf\//,
        'chalk',
        'ora',
        'commander',
        'node-html-parser',
    ],
    shims: true,
    sourcemap: true,
});
