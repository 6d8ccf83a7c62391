/**
 * @module agents/autonomous
 * @description Self-driving robot that turns away from detected obstacles
 */

import { orientationToHeading } from './constants';
import { Robot, type RobotInit } from './robot';
import type { AgentUpdate, SpatialQuery, UpdateOptions } from './types';

export interface AutonomousRobotInit extends RobotInit {
    /** 0 = top, 1 = right, 2 = bottom, 3 = left; anything else faces right */
    orientation: number;
    /** Degrees added to the heading on every tick an obstacle is detected */
    avoidanceAngle: number;
}

export class AutonomousRobot extends Robot {
    readonly kind = 'autonomous' as const;
    readonly avoidanceAngle: number;

    constructor(init: AutonomousRobotInit) {
        super(init, orientationToHeading(init.orientation));
        this.avoidanceAngle = init.avoidanceAngle;
    }

    get isMoving(): boolean {
        return true;
    }

    /**
     * Integrate, then turn by `avoidanceAngle` if an obstacle is in the cone.
     *
     * The turn repeats on every detecting tick and steers the next tick's motion.
     */
    update(world: SpatialQuery, options: UpdateOptions = {}): AgentUpdate {
        const moved = this.integrate();
        const detected = this.detectObstacle(world, options.detectionMode);
        if (detected) {
            this.setHeading(this.heading + this.avoidanceAngle);
        }
        return this.outcome({ moved, detected, turned: detected });
    }
}
