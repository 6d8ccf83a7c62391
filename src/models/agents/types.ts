/**
 * @module agents/types
 * @description Type definitions for the agent model
 */

import type { Rect, Vector2 } from '../geometry/types';

export type AgentKind = 'autonomous' | 'remote';

export type EntityKind = AgentKind | 'obstacle';

export type RotationDirection = 'none' | 'left' | 'right';

/**
 * How the sensor cone is tested against obstacles
 * - `polygon`: exact trapezoid vs square intersection
 * - `bounds`: any obstacle overlapping the cone's bounding rectangle
 */
export type DetectionMode = 'polygon' | 'bounds';

/**
 * Initial orientation choices for autonomous robots, by import index
 */
export type OrientationName = 'top' | 'right' | 'bottom' | 'left';

/**
 * Anything the sensor can see
 */
export interface SensedEntity {
    readonly kind: EntityKind;
    readonly id: string;
    bounds(): Rect;
}

/**
 * Spatial query collaborator used by detection
 *
 * Returns every entity whose bounds overlap `region`, in a stable order.
 */
export interface SpatialQuery<E extends SensedEntity = SensedEntity> {
    query(region: Rect): readonly E[];
}

/**
 * Read-only pose used by rendering and logging
 */
export interface AgentPose {
    id: string;
    kind: AgentKind;
    x: number;
    y: number;
    /** Degrees, [0, 360) */
    heading: number;
    isMoving: boolean;
}

/**
 * Per-tick options forwarded by the scheduler
 */
export interface UpdateOptions {
    detectionMode?: DetectionMode;
}

/**
 * Outcome of one agent update
 */
export interface AgentUpdate {
    id: string;
    kind: AgentKind;
    /** Position changed this tick */
    moved: boolean;
    /** Remote robot applied a rotation increment this tick */
    rotated: boolean;
    /** An obstacle was inside the sensor cone after moving */
    detected: boolean;
    /** Autonomous robot turned by its avoidance angle */
    turned: boolean;
    /** Remote robot stopped because of the detection */
    stopped: boolean;
    position: Vector2;
    heading: number;
}
