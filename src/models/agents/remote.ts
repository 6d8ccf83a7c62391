/**
 * @module agents/remote
 * @description Command-driven robot with a stop-on-detect safety reaction
 *
 * States: Stopped (initial) and Moving.
 * - moveForward(): Stopped → Moving
 * - stop(): Moving → Stopped
 * - update(): while Moving, integrate; a detection forces stop()
 *
 * Rotation commands only record intent; the scheduler applies one
 * increment per tick through applyRotation().
 */

import { Robot, type RobotInit } from './robot';
import type { AgentUpdate, RotationDirection, SpatialQuery, UpdateOptions } from './types';

export class RemoteRobot extends Robot {
    readonly kind = 'remote' as const;

    private moving = false;
    private direction: RotationDirection = 'none';

    constructor(init: RobotInit) {
        super(init, 0);
    }

    get isMoving(): boolean {
        return this.moving;
    }

    get rotationDirection(): RotationDirection {
        return this.direction;
    }

    // ==================== Commands ====================

    moveForward(): void {
        this.moving = true;
    }

    stop(): void {
        this.moving = false;
    }

    rotateLeft(): void {
        this.direction = 'left';
    }

    rotateRight(): void {
        this.direction = 'right';
    }

    stopRotation(): void {
        this.direction = 'none';
    }

    // ==================== Tick ====================

    /**
     * Apply one rotation increment in the recorded direction.
     * Left turns counter-clockwise on screen (heading decreases).
     *
     * @returns true if the heading changed
     */
    applyRotation(stepDegrees: number): boolean {
        if (this.direction === 'none' || stepDegrees === 0) return false;
        const delta = this.direction === 'left' ? -stepDegrees : stepDegrees;
        this.setHeading(this.heading + delta);
        return true;
    }

    update(world: SpatialQuery, options: UpdateOptions = {}): AgentUpdate {
        if (!this.moving) {
            return this.outcome({ moved: false, detected: false });
        }

        const moved = this.integrate();
        const detected = this.detectObstacle(world, options.detectionMode);
        if (detected) {
            this.stop();
        }
        return this.outcome({ moved, detected, stopped: detected });
    }
}
