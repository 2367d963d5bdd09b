import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

const srcDir = (sub: string) => fileURLToPath(new URL(`./src/${sub}`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@shared': srcDir('shared'),
            '@modules': srcDir('modules'),
            '@lib': srcDir('lib'),
        },
    },
    build: {
        outDir: 'dist',
        emptyOutDir: true,
        target: 'node20',
        sourcemap: process.env.NODE_ENV === 'development' ? 'inline' : false,
        lib: {
            entry: srcDir('index.ts'),
            formats: ['es'],
            fileName: 'markup-sieve',
        },
        rollupOptions: {
            // jsdom stays a runtime dependency; never bundle it or node builtins.
            external: ['jsdom', /^node:/],
        },
    },
});
