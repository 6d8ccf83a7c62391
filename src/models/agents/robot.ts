/**
 * @module agents/robot
 * @description Shared robot state and motion integration
 */

import { headingVector, normalizeAngle } from '../geometry/angles';
import type { Polygon, Rect, Vector2 } from '../geometry/types';
import { INTEGRATION_FACTOR, ROBOT_RADIUS } from './constants';
import { coneDetectsObstacle, sensorCone } from './sensor';
import type {
    AgentKind,
    AgentPose,
    AgentUpdate,
    DetectionMode,
    SpatialQuery,
    UpdateOptions,
} from './types';

export interface RobotInit {
    id: string;
    x: number;
    y: number;
    /** Units per tick at full step */
    speed: number;
    detectionRadius: number;
}

/**
 * Base class for both robot variants
 *
 * Position changes only through {@link Robot.integrate}; heading is kept in
 * [0, 360) by every mutator.
 */
export abstract class Robot {
    abstract readonly kind: AgentKind;

    readonly id: string;
    readonly speed: number;
    readonly detectionRadius: number;

    private x: number;
    private y: number;
    private headingDeg: number;

    protected constructor(init: RobotInit, heading: number) {
        this.id = init.id;
        this.x = init.x;
        this.y = init.y;
        this.speed = init.speed;
        this.detectionRadius = init.detectionRadius;
        this.headingDeg = normalizeAngle(heading);
    }

    get position(): Vector2 {
        return { x: this.x, y: this.y };
    }

    /** Degrees, [0, 360) */
    get heading(): number {
        return this.headingDeg;
    }

    abstract get isMoving(): boolean;

    protected setHeading(degrees: number): void {
        this.headingDeg = normalizeAngle(degrees);
    }

    /**
     * Move 10% of the way toward the point one full step ahead on the current heading
     *
     * @returns true if the position changed
     */
    protected integrate(): boolean {
        const dir = headingVector(this.headingDeg);
        const targetX = this.x + this.speed * dir.x;
        const targetY = this.y + this.speed * dir.y;

        const nextX = this.x + INTEGRATION_FACTOR * (targetX - this.x);
        const nextY = this.y + INTEGRATION_FACTOR * (targetY - this.y);
        const moved = nextX !== this.x || nextY !== this.y;

        this.x = nextX;
        this.y = nextY;
        this.setHeading(this.headingDeg);
        return moved;
    }

    /**
     * Occupied square, centered on the position
     */
    bounds(): Rect {
        return {
            x: this.x - ROBOT_RADIUS,
            y: this.y - ROBOT_RADIUS,
            width: ROBOT_RADIUS * 2,
            height: ROBOT_RADIUS * 2,
        };
    }

    /**
     * Sensor cone at the current pose, in world coordinates
     */
    sensorCone(): Polygon {
        return sensorCone(this.position, this.headingDeg, this.detectionRadius);
    }

    /**
     * Whether any obstacle lies in the sensor cone
     */
    detectObstacle(world: SpatialQuery, mode: DetectionMode = 'polygon'): boolean {
        return coneDetectsObstacle(this.sensorCone(), world, mode);
    }

    pose(): AgentPose {
        return {
            id: this.id,
            kind: this.kind,
            x: this.x,
            y: this.y,
            heading: this.headingDeg,
            isMoving: this.isMoving,
        };
    }

    protected outcome(partial: Pick<AgentUpdate, 'moved' | 'detected'> & Partial<AgentUpdate>): AgentUpdate {
        return {
            id: this.id,
            kind: this.kind,
            rotated: false,
            turned: false,
            stopped: false,
            ...partial,
            position: this.position,
            heading: this.headingDeg,
        };
    }

    /**
     * Advance one tick
     */
    abstract update(world: SpatialQuery, options?: UpdateOptions): AgentUpdate;
}
