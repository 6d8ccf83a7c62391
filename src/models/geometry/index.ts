/**
 * @module src/models/geometry
 * @description 2D geometry helpers: angles in degrees, point rotation,
 * axis-aligned rectangles, and convex polygon intersection (SAT)
 */

export type { Vector2, Rect, Polygon } from './types';
export { normalizeAngle, toRadians, rotatePoint, translatePoint, headingVector } from './angles';
export { rectFromPoints, rectsIntersect, rectContains, rectToPolygon, polygonsIntersect } from './shapes';
