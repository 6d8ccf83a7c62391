/**
 * @packageDocumentation
 * @module arenabots/node
 *
 * Node.js entry point: everything from the main index plus file I/O.
 *
 * ## Additional Exports (Node.js only)
 * - `JsonlFileLogger` - append log entries to a JSONL file
 * - `readSceneFile`, `loadSceneFile` - import scene descriptions from disk
 *
 * ## Usage Example
 * ```typescript
 * import { engine, JsonlFileLogger, loadSceneFile } from 'arenabots/node';
 *
 * const sim = new engine.Simulation({}, new JsonlFileLogger({ run: 'demo', outputFile: 'logs/demo.jsonl' }));
 * loadSceneFile(sim, 'scenes/demo.txt');
 * ```
 */

// Re-export everything from the main index
export * from './index';

export { JsonlFileLogger } from './src/core/logging-node';
export { readSceneFile, loadSceneFile } from './src/io/scene-file';
