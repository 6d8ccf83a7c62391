import { defineConfig } from 'tsup'

/**
 * Build configuration for the arenabots library and CLI
 *
 * - index: browser-safe entry (no file system access)
 * - node: index plus file-based logging and scene loading
 * - cli: headless runner, exposed as the package bin
 */
export default defineConfig({
    name: 'arenabots',

    entry: {
        index: 'index.ts',
        node: 'node.ts',
        cli: 'src/cli.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
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
    platform: 'node',
})
