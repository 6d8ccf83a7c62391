/**
 * @module src/io
 * @description Scene text format (browser-safe)
 *
 * File loading lives in `./scene-file` and is exported from the `node`
 * entry point only.
 */

export {
    SCENE_BLOCK_TYPES,
    parseSceneText,
    isSceneBlockType,
    readNumber,
    importScene,
    type SceneBlockType,
    type SceneKey,
    type SceneBlock,
    type ParsedScene,
    type ImportWarning,
    type ImportResult,
} from './scene-format';
