import { defineConfig } from 'tsup'

/**
 * tsup configuration for nelder-mead-optimizer
 *
 * - Single package entry plus core/numeric sub-path bundles
 * - splitting: shared code goes to chunk-*.js files
 */
export default defineConfig({
    name: 'nelder-mead-optimizer',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Bundles ====================
        core: 'src/core/index.ts',
        numeric: 'src/models/numeric/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,

    sourcemap: true,
    clean: true,

    outDir: 'dist',
    target: 'es2022',

    // No Node.js built-ins are imported by the library itself
    platform: 'neutral',
})
