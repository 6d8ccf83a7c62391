import type { Vector2 } from './types'

/**
 * Normalize angle (degrees) to [0, 360)
 *
 * Works for any finite input; repeated avoidance turns can push a heading
 * many revolutions away from the range.
 */
export function normalizeAngle(degrees: number): number {
    let wrapped = degrees % 360
    if (wrapped < 0) wrapped += 360
    // -1e-15 + 360 rounds to 360
    if (wrapped >= 360) wrapped -= 360
    // fold -0 into 0
    return wrapped + 0
}

/**
 * Degrees to radians
 */
export function toRadians(degrees: number): number {
    return degrees * Math.PI / 180
}

/**
 * Rotate a point about the origin
 */
export function rotatePoint(point: Vector2, angleRadians: number): Vector2 {
    const cos = Math.cos(angleRadians)
    const sin = Math.sin(angleRadians)
    return {
        x: cos * point.x - sin * point.y,
        y: sin * point.x + cos * point.y,
    }
}

export function translatePoint(point: Vector2, offset: Vector2): Vector2 {
    return { x: point.x + offset.x, y: point.y + offset.y }
}

/**
 * Unit direction for a heading in degrees
 */
export function headingVector(degrees: number): Vector2 {
    const rad = toRadians(degrees)
    return { x: Math.cos(rad), y: Math.sin(rad) }
}
