import { defineConfig } from 'tsup';

export default defineConfig([{
    entry: {
        index: 'src/index.ts',
    },
    format: ['esm', 'cjs'],
    dts: true,
    sourcemap: false,
    clean: false,
    minify: true,
    treeshake: true,
    outDir: 'dist',
    skipNodeModulesBundle: true
}, {
    // Optimized build: the static ceiling is fixed at bundle time.
    // Override with e.g. LOGTREE_FEATURES="release_max_level_warn" when bundling.
    entry: {
        release: 'src/index.ts',
    },
    format: ['esm', 'cjs'],
    define: {
        __LOGTREE_OPTIMIZED__: 'true',
        __LOGTREE_FEATURES__: JSON.stringify(process.env.LOGTREE_FEATURES ?? ''),
    },
    dts: true,
    sourcemap: false,
    clean: false,
    minify: true,
    treeshake: true,
    outDir: 'dist',
    skipNodeModulesBundle: true
}]);
