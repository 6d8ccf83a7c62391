/**
 * @module io/scene-file
 * @description Load scene descriptions from disk (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import { NotFoundError, wrapError } from '../core/errors';
import type { Simulation } from '../engine/simulation';
import type { ImportResult } from './scene-format';

/**
 * Read a scene file as UTF-8 text
 *
 * @throws NotFoundError when the file does not exist
 */
export function readSceneFile(filePath: string): string {
    const fullPath = path.resolve(filePath);
    if (!fs.existsSync(fullPath)) {
        throw new NotFoundError(`Cannot open file for reading: ${fullPath}`, { path: fullPath });
    }
    try {
        return fs.readFileSync(fullPath, 'utf8');
    } catch (error) {
        throw wrapError(error);
    }
}

/**
 * Read a scene file and import it into a simulation
 */
export function loadSceneFile(simulation: Simulation, filePath: string): ImportResult {
    return simulation.importScene(readSceneFile(filePath));
}
