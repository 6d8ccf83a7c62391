/**
 * Error Type Tests
 */

import { describe, it, expect } from 'vitest';
import {
    ErrorCodes,
    ArenaError,
    ValidationError,
    PlacementError,
    ParseError,
    NotFoundError,
    isArenaError,
    hasErrorCode,
    wrapError,
} from '../src/core';

describe('Error classes', () => {
    it('should carry code, name and details', () => {
        const error = new ValidationError('bad speed', { speed: -1 });

        expect(error).toBeInstanceOf(ArenaError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('ValidationError');
        expect(error.code).toBe(ErrorCodes.VALIDATION_ERROR);
        expect(error.details).toEqual({ speed: -1 });
    });

    it('should serialize to JSON', () => {
        const error = new NotFoundError('No remote robot with id robot-4', { id: 'robot-4' });
        const json = error.toJSON();

        expect(json).toMatchObject({
            name: 'NotFoundError',
            code: 'NOT_FOUND',
            message: 'No remote robot with id robot-4',
            details: { id: 'robot-4' },
        });
        expect(json.timestamp).toBe(error.timestamp);
    });

    it('should prefix parse errors with their line', () => {
        const error = new ParseError('Unknown object type: Tank', 12);
        expect(error.message).toBe('Line 12: Unknown object type: Tank');
        expect(error.line).toBe(12);
    });

    it('should expose the placement conflict', () => {
        const conflict = { robotFound: false, obstacleFound: true, outOfBounds: false };
        const error = new PlacementError('occupied', conflict);
        expect(error.conflict).toEqual(conflict);
        expect(error.code).toBe('PLACEMENT_REJECTED');
    });
});

describe('Error utilities', () => {
    it('should recognize arena errors', () => {
        expect(isArenaError(new ParseError('x', 1))).toBe(true);
        expect(isArenaError(new Error('plain'))).toBe(false);
        expect(isArenaError('text')).toBe(false);
    });

    it('should match error codes', () => {
        const error = new NotFoundError('missing');
        expect(hasErrorCode(error, ErrorCodes.NOT_FOUND)).toBe(true);
        expect(hasErrorCode(error, ErrorCodes.PARSE_ERROR)).toBe(false);
        expect(hasErrorCode(new Error('plain'), ErrorCodes.NOT_FOUND)).toBe(false);
    });

    it('should wrap foreign errors', () => {
        const existing = new ValidationError('kept');
        expect(wrapError(existing)).toBe(existing);

        const wrapped = wrapError(new TypeError('boom'));
        expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
        expect(wrapped.message).toBe('boom');
        expect(wrapped.details).toMatchObject({ originalName: 'TypeError' });

        expect(wrapError('oops', ErrorCodes.PARSE_ERROR).code).toBe('PARSE_ERROR');
        expect(wrapError(42).message).toBe('42');
    });
});
