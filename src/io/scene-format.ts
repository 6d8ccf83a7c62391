/**
 * @module io/scene-format
 * @description Text scene description: parse and place
 *
 * ## Format
 * ```
 * # comment
 * AutonomousRobot {
 *     positionX = 100
 *     positionY = 200
 *     orientation = 1
 *     speed = 5
 *     detectionRadius = 40
 *     avoidanceAngle = 45
 * }
 * Obstacle {
 *     positionX = 300
 *     positionY = 180
 *     width = 50
 * }
 * ```
 *
 * Lines are trimmed. Blank lines and `#` comments are skipped. `Type {` opens a
 * block, a line starting with `}` closes it, and anything else inside a block
 * is a `key = value` attribute.
 */

import { isArenaError, ParseError, ValidationError, type ErrorCode } from '../core/errors';
import {
    placeAutonomousRobot,
    placeObstacle,
    placeRemoteRobot,
} from '../models/world/placement';
import type { Scene, SceneEntity } from '../models/world/scene';

// ==================== Types ====================

export const SCENE_BLOCK_TYPES = ['AutonomousRobot', 'RemoteRobot', 'Obstacle'] as const;

export type SceneBlockType = (typeof SCENE_BLOCK_TYPES)[number];

export type SceneKey =
    | 'positionX'
    | 'positionY'
    | 'speed'
    | 'orientation'
    | 'detectionRadius'
    | 'avoidanceAngle'
    | 'width';

const INTEGER_KEYS: ReadonlySet<SceneKey> = new Set<SceneKey>(['positionX', 'positionY', 'speed', 'orientation', 'width']);

export interface SceneBlock {
    type: string;
    /** 1-based line of the opening marker */
    line: number;
    attributes: Record<string, string>;
}

export interface ParsedScene {
    blocks: SceneBlock[];
    warnings: ParseError[];
}

export interface ImportWarning {
    line: number;
    code: ErrorCode;
    message: string;
}

export interface ImportResult {
    placed: SceneEntity[];
    warnings: ImportWarning[];
}

// ==================== Parsing ====================

/**
 * Split scene text into typed blocks of raw attributes
 *
 * Never throws; problems are returned as warnings.
 */
export function parseSceneText(text: string): ParsedScene {
    const blocks: SceneBlock[] = [];
    const warnings: ParseError[] = [];
    let current: SceneBlock | null = null;

    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const lineNo = i + 1;
        const line = lines[i].trim();
        if (line === '' || line.startsWith('#')) {
            continue;
        }

        if (line.endsWith('{')) {
            if (current !== null) {
                warnings.push(new ParseError(`Block ${current.type} was not closed`, current.line));
            }
            current = { type: line.slice(0, -1).trim(), line: lineNo, attributes: {} };
        } else if (line.startsWith('}')) {
            if (current === null) {
                warnings.push(new ParseError('Closing marker without an open block', lineNo));
            } else {
                blocks.push(current);
                current = null;
            }
        } else if (current === null) {
            warnings.push(new ParseError(`Attribute outside of a block: ${line}`, lineNo));
        } else {
            const parts = line.split('=');
            if (parts.length === 2) {
                current.attributes[parts[0].trim()] = parts[1].trim();
            } else {
                warnings.push(new ParseError(`Malformed attribute: ${line}`, lineNo));
            }
        }
    }

    if (current !== null) {
        warnings.push(new ParseError(`Block ${current.type} was not closed`, current.line));
    }

    return { blocks, warnings };
}

export function isSceneBlockType(type: string): type is SceneBlockType {
    return SCENE_BLOCK_TYPES.some(known => known === type);
}

/**
 * Numeric attribute; missing keys read as 0, integer keys are truncated
 *
 * @throws ValidationError when the value is not a number
 */
export function readNumber(block: SceneBlock, key: SceneKey): number {
    const raw = block.attributes[key];
    if (raw === undefined || raw === '') {
        return 0;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new ValidationError(`${block.type}: ${key} is not a number: ${raw}`, {
            key,
            value: raw,
        });
    }
    return INTEGER_KEYS.has(key) ? Math.trunc(value) : value;
}

// ==================== Import ====================

function placeBlock(scene: Scene, type: SceneBlockType, block: SceneBlock): SceneEntity {
    const x = readNumber(block, 'positionX');
    const y = readNumber(block, 'positionY');

    switch (type) {
        case 'AutonomousRobot':
            return placeAutonomousRobot(scene, {
                x,
                y,
                orientation: readNumber(block, 'orientation'),
                speed: readNumber(block, 'speed'),
                detectionRadius: readNumber(block, 'detectionRadius'),
                avoidanceAngle: readNumber(block, 'avoidanceAngle'),
            });
        case 'RemoteRobot':
            return placeRemoteRobot(scene, {
                x,
                y,
                speed: readNumber(block, 'speed'),
                detectionRadius: readNumber(block, 'detectionRadius'),
            });
        case 'Obstacle':
            return placeObstacle(scene, { x, y, size: readNumber(block, 'width') });
    }
}

/**
 * Parse `text` and place every block through the creation layer
 *
 * Blocks that fail to parse, validate, or place are reported and skipped;
 * the rest are added to `scene` in file order.
 */
export function importScene(scene: Scene, text: string): ImportResult {
    const parsed = parseSceneText(text);
    const placed: SceneEntity[] = [];
    const warnings: ImportWarning[] = parsed.warnings.map(w => ({ line: w.line, code: w.code, message: w.message }));

    for (const block of parsed.blocks) {
        if (!isSceneBlockType(block.type)) {
            const error = new ParseError(`Unknown object type: ${block.type}`, block.line);
            warnings.push({ line: block.line, code: error.code, message: error.message });
            continue;
        }

        try {
            placed.push(placeBlock(scene, block.type, block));
        } catch (error) {
            if (!isArenaError(error)) throw error;
            warnings.push({ line: block.line, code: error.code, message: `Line ${block.line}: ${error.message}` });
        }
    }

    warnings.sort((a, b) => a.line - b.line);
    return { placed, warnings };
}
