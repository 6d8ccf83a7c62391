/**
 * @module agents/sensor
 * @description Forward sensor cone and obstacle detection
 *
 * The cone is a trapezoid in the robot's local frame (x forward):
 *
 * ```
 *   near edge: x = R,     half-width hb = min(ht / 4, R / 3)
 *   far edge:  x = D + R, half-width ht = D * tan(30°)
 * ```
 *
 * with R the robot radius and D the detection radius. Corners are rotated by
 * the heading and translated to the robot's position.
 */

import { rotatePoint, toRadians, translatePoint } from '../geometry/angles';
import { polygonsIntersect, rectFromPoints, rectToPolygon } from '../geometry/shapes';
import type { Polygon, Vector2 } from '../geometry/types';
import { ROBOT_RADIUS, SENSOR_HALF_ANGLE_DEG } from './constants';
import type { DetectionMode, SensedEntity, SpatialQuery } from './types';

/**
 * Half-widths of the cone's near and far edges
 */
export function sensorHalfWidths(detectionRadius: number): { near: number; far: number } {
    const far = detectionRadius * Math.tan(toRadians(SENSOR_HALF_ANGLE_DEG));
    const near = Math.min(far / 4, ROBOT_RADIUS / 3);
    return { near, far };
}

/**
 * Sensor cone corners in local coordinates: near-left, near-right, far-right, far-left
 */
export function localSensorCone(detectionRadius: number): Polygon {
    const { near, far } = sensorHalfWidths(detectionRadius);
    const farX = detectionRadius + ROBOT_RADIUS;
    return [
        { x: ROBOT_RADIUS, y: -near },
        { x: ROBOT_RADIUS, y: near },
        { x: farX, y: far },
        { x: farX, y: -far },
    ];
}

/**
 * Sensor cone corners in world coordinates
 */
export function sensorCone(position: Vector2, headingDegrees: number, detectionRadius: number): Polygon {
    const rad = toRadians(headingDegrees);
    return localSensorCone(detectionRadius).map(corner =>
        translatePoint(rotatePoint(corner, rad), position)
    );
}

/**
 * Obstacles seen by a cone
 *
 * The world is asked for everything overlapping the cone's bounding rectangle;
 * only obstacles are kept, so the querying robot and other robots are ignored.
 */
export function obstaclesInCone<E extends SensedEntity>(
    cone: Polygon,
    world: SpatialQuery<E>,
    mode: DetectionMode = 'polygon'
): E[] {
    const candidates = world.query(rectFromPoints(cone)).filter(entity => entity.kind === 'obstacle');
    if (mode === 'bounds') {
        return candidates;
    }
    return candidates.filter(entity => polygonsIntersect(cone, rectToPolygon(entity.bounds())));
}

export function coneDetectsObstacle(
    cone: Polygon,
    world: SpatialQuery,
    mode: DetectionMode = 'polygon'
): boolean {
    return obstaclesInCone(cone, world, mode).length > 0;
}
