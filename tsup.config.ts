import { defineConfig } from 'tsup'

/**
 * tsup configuration for netgym-adapter
 *
 * - splitting: shared code goes to chunks used by both entries
 * - shims: provides `import.meta.url` in the CommonJS output (config file loader)
 */
export default defineConfig({
    name: 'netgym-adapter',

    entry: {
        // ==================== Main Entries ====================
        // Default entry (includes Node.js-only modules)
        index: 'index.ts',

        // Browser-safe entry (no file access)
        browser: 'browser.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/telemetry': 'src/telemetry/index.ts',
        'src/adapter': 'src/adapter/index.ts',
        'src/envs': 'src/envs/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,
    shims: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins are resolved at runtime
    external: [
        'fs',
        'path',
        'url',
    ],

    outDir: 'dist',
    target: 'es2022',

    platform: 'neutral',
})
