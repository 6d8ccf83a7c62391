/**
 * @module world/placement
 * @description Creation layer: validate parameters, refuse occupied space, add to the scene
 */

import { PlacementError, ValidationError, type PlacementConflict } from '../../core/errors';
import { AutonomousRobot } from '../agents/autonomous';
import { ROBOT_RADIUS } from '../agents/constants';
import { RemoteRobot } from '../agents/remote';
import { rectContains } from '../geometry/shapes';
import type { Rect } from '../geometry/types';
import { Obstacle } from './obstacle';
import type { Scene } from './scene';

// ==================== Parameters ====================

export interface RemoteRobotParams {
    /** Center */
    x: number;
    y: number;
    speed: number;
    detectionRadius: number;
}

export interface AutonomousRobotParams extends RemoteRobotParams {
    /** 0 = top, 1 = right, 2 = bottom, 3 = left */
    orientation: number;
    avoidanceAngle: number;
}

export interface ObstacleParams {
    /** Top-left corner */
    x: number;
    y: number;
    size: number;
}

// ==================== Validation ====================

function checkFinite(errors: string[], name: string, value: number): void {
    if (!Number.isFinite(value)) {
        errors.push(`${name} must be a finite number`);
    }
}

function robotErrors(params: RemoteRobotParams): string[] {
    const errors: string[] = [];
    checkFinite(errors, 'x', params.x);
    checkFinite(errors, 'y', params.y);
    if (!Number.isInteger(params.speed) || params.speed < 0) {
        errors.push('speed must be a non-negative integer');
    }
    if (!Number.isFinite(params.detectionRadius) || params.detectionRadius < 0) {
        errors.push('detectionRadius must be a non-negative number');
    }
    return errors;
}

function throwIfInvalid(subject: string, errors: string[], params: object): void {
    if (errors.length > 0) {
        throw new ValidationError(`Invalid ${subject}: ${errors.join('; ')}`, { errors, params });
    }
}

export function validateRemoteRobotParams(params: RemoteRobotParams): void {
    throwIfInvalid('remote robot', robotErrors(params), params);
}

export function validateAutonomousRobotParams(params: AutonomousRobotParams): void {
    const errors = robotErrors(params);
    checkFinite(errors, 'orientation', params.orientation);
    checkFinite(errors, 'avoidanceAngle', params.avoidanceAngle);
    throwIfInvalid('autonomous robot', errors, params);
}

export function validateObstacleParams(params: ObstacleParams): void {
    const errors: string[] = [];
    checkFinite(errors, 'x', params.x);
    checkFinite(errors, 'y', params.y);
    if (!Number.isFinite(params.size) || params.size <= 0) {
        errors.push('size must be a positive number');
    }
    throwIfInvalid('obstacle', errors, params);
}

// ==================== Overlap ====================

type Subject = 'robot' | 'obstacle';

/**
 * Footprint of a robot centered at (x, y)
 */
export function robotArea(x: number, y: number): Rect {
    return {
        x: x - ROBOT_RADIUS,
        y: y - ROBOT_RADIUS,
        width: ROBOT_RADIUS * 2,
        height: ROBOT_RADIUS * 2,
    };
}

/**
 * What already occupies `area`
 */
export function findConflict(scene: Scene, area: Rect): PlacementConflict {
    const conflict: PlacementConflict = {
        robotFound: false,
        obstacleFound: false,
        outOfBounds: !rectContains(scene.arena, area),
    };
    for (const entity of scene.query(area)) {
        switch (entity.kind) {
            case 'autonomous':
            case 'remote':
                conflict.robotFound = true;
                break;
            case 'obstacle':
                conflict.obstacleFound = true;
                break;
        }
    }
    return conflict;
}

export function placementMessage(subject: Subject, conflict: PlacementConflict): string {
    const article = subject === 'robot' ? 'a robot' : 'an obstacle';
    if (conflict.outOfBounds) {
        return `Cannot place ${article} here. The position is outside the arena.`;
    }

    let message = `Cannot place ${article} here. The space is already occupied by `;
    if (conflict.robotFound && conflict.obstacleFound) {
        message += 'another robot and an obstacle.';
    } else if (conflict.robotFound) {
        message += 'another robot.';
    } else {
        message += subject === 'robot' ? 'an obstacle.' : 'another obstacle.';
    }
    return message;
}

function assertFree(scene: Scene, area: Rect, subject: Subject): void {
    const conflict = findConflict(scene, area);
    if (conflict.outOfBounds || conflict.robotFound || conflict.obstacleFound) {
        throw new PlacementError(placementMessage(subject, conflict), conflict);
    }
}

// ==================== Factories ====================

export function placeAutonomousRobot(scene: Scene, params: AutonomousRobotParams): AutonomousRobot {
    validateAutonomousRobotParams(params);
    assertFree(scene, robotArea(params.x, params.y), 'robot');

    const robot = new AutonomousRobot({ id: scene.nextId('robot'), ...params });
    scene.addEntity(robot);
    return robot;
}

export function placeRemoteRobot(scene: Scene, params: RemoteRobotParams): RemoteRobot {
    validateRemoteRobotParams(params);
    assertFree(scene, robotArea(params.x, params.y), 'robot');

    const robot = new RemoteRobot({ id: scene.nextId('robot'), ...params });
    scene.addEntity(robot);
    return robot;
}

export function placeObstacle(scene: Scene, params: ObstacleParams): Obstacle {
    validateObstacleParams(params);
    assertFree(scene, { x: params.x, y: params.y, width: params.size, height: params.size }, 'obstacle');

    const obstacle = new Obstacle({ id: scene.nextId('obstacle'), ...params });
    scene.addEntity(obstacle);
    return obstacle;
}
