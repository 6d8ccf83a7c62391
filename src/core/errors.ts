/**
 * @module core/errors
 * @description Unified error types and error codes for the arena layers
 *
 * The tick engine itself never throws. These errors are raised by the layers
 * around it (configuration, placement, scene import, controller lookups) so
 * callers can branch on a stable `code` instead of message text.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the arena library
 */
export const ErrorCodes = {
    // Validation Errors
    /** Entity parameters failed validation */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Configuration validation failed */
    INVALID_CONFIG: 'INVALID_CONFIG',

    // Scene Errors
    /** Entity bounds overlap another entity or leave the arena */
    PLACEMENT_REJECTED: 'PLACEMENT_REJECTED',
    /** Entity or file could not be found */
    NOT_FOUND: 'NOT_FOUND',

    // Import Errors
    /** Scene text could not be parsed */
    PARSE_ERROR: 'PARSE_ERROR',

    /** Internal error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the arena library
 */
export class ArenaError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'ArenaError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, ArenaError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Validation error (invalid entity parameters)
 */
export class ValidationError extends ArenaError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Configuration error
 */
export class ConfigError extends ArenaError {
    readonly errors: string[];

    constructor(errors: string[]) {
        super(ErrorCodes.INVALID_CONFIG, `Invalid arena config: ${errors.join('; ')}`, { errors });
        this.name = 'ConfigError';
        this.errors = errors;
    }
}

/**
 * What blocked a placement
 */
export interface PlacementConflict {
    robotFound: boolean;
    obstacleFound: boolean;
    outOfBounds: boolean;
}

/**
 * Placement rejected (space occupied or outside the arena)
 */
export class PlacementError extends ArenaError {
    readonly conflict: PlacementConflict;

    constructor(message: string, conflict: PlacementConflict) {
        super(ErrorCodes.PLACEMENT_REJECTED, message, conflict);
        this.name = 'PlacementError';
        this.conflict = conflict;
    }
}

/**
 * Scene text parse error
 */
export class ParseError extends ArenaError {
    readonly line: number;

    constructor(message: string, line: number) {
        super(ErrorCodes.PARSE_ERROR, `Line ${line}: ${message}`, { line });
        this.name = 'ParseError';
        this.line = line;
    }
}

/**
 * Entity or resource not found
 */
export class NotFoundError extends ArenaError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.NOT_FOUND, message, details);
        this.name = 'NotFoundError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is an ArenaError
 */
export function isArenaError(error: unknown): error is ArenaError {
    return error instanceof ArenaError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isArenaError(error) && error.code === code;
}

/**
 * Wrap any error into an ArenaError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): ArenaError {
    if (isArenaError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new ArenaError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new ArenaError(defaultCode, String(error));
}
