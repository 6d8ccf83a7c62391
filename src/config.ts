/**
 * @module config
 * @description Arena simulation configuration
 */

import { ConfigError } from './core/errors';
import type { DetectionMode } from './models/agents/types';
import { DEFAULT_ARENA_BOUNDS, type ArenaBounds } from './models/world/scene';

// ==================== Configuration ====================

export interface ArenaConfig {
    /** Wall-clock interval between ticks while running */
    tickIntervalMs: number;
    /** Placement area */
    arena: ArenaBounds;
    /** Sensor cone test */
    detectionMode: DetectionMode;
    /** Degrees a rotating remote robot turns per tick */
    remoteRotationStep: number;
}

/**
 * Default configuration
 */
export const DEFAULT_ARENA_CONFIG: ArenaConfig = {
    tickIntervalMs: 10, // update every 10 ms
    arena: DEFAULT_ARENA_BOUNDS,
    detectionMode: 'polygon',
    remoteRotationStep: 1,
};

export type ArenaConfigInput = Partial<Omit<ArenaConfig, 'arena'>> & {
    arena?: Partial<ArenaBounds>;
};

/**
 * Validation result for ArenaConfig
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Validation ====================

export function validateArenaConfig(config: ArenaConfig): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Number.isFinite(config.tickIntervalMs) || config.tickIntervalMs <= 0) {
        errors.push('tickIntervalMs must be a positive number');
    }

    const { arena } = config;
    if (![arena.x, arena.y, arena.width, arena.height].every(Number.isFinite)) {
        errors.push('arena bounds must be finite numbers');
    } else if (arena.width <= 0 || arena.height <= 0) {
        errors.push('arena width and height must be positive');
    }

    if (config.detectionMode !== 'polygon' && config.detectionMode !== 'bounds') {
        errors.push(`detectionMode must be 'polygon' or 'bounds', got '${String(config.detectionMode)}'`);
    }

    if (!Number.isFinite(config.remoteRotationStep) || config.remoteRotationStep < 0) {
        errors.push('remoteRotationStep must be a non-negative number');
    } else if (config.remoteRotationStep === 0) {
        warnings.push('remoteRotationStep is 0: rotate commands will have no effect');
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

/**
 * Merge overrides with defaults and validate
 *
 * @throws ConfigError when the merged config is invalid
 */
export function createArenaConfig(input: ArenaConfigInput = {}): ArenaConfig {
    const config: ArenaConfig = {
        ...DEFAULT_ARENA_CONFIG,
        ...input,
        arena: { ...DEFAULT_ARENA_CONFIG.arena, ...input.arena },
    };

    const result = validateArenaConfig(config);
    if (!result.valid) {
        throw new ConfigError(result.errors);
    }
    return config;
}
