/**
 * Test Utilities for the arena library
 * Shared fixtures for robots, obstacles and worlds
 */

import { AutonomousRobot, type AutonomousRobotInit } from '../src/models/agents/autonomous';
import { RemoteRobot } from '../src/models/agents/remote';
import type { RobotInit } from '../src/models/agents/robot';
import type { SensedEntity, SpatialQuery } from '../src/models/agents/types';
import { Obstacle } from '../src/models/world/obstacle';
import { Scene, type SceneEntity } from '../src/models/world/scene';

/**
 * Check if two numbers are approximately equal
 */
export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
    return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/**
 * World with nothing in it
 */
export function emptyWorld(): SpatialQuery<SensedEntity> {
    return { query: () => [] };
}

/**
 * Autonomous robot at the origin facing right (speed 10, detection radius 30)
 */
export function makeAutonomous(overrides: Partial<AutonomousRobotInit> = {}): AutonomousRobot {
    return new AutonomousRobot({
        id: 'auto',
        x: 0,
        y: 0,
        orientation: 1,
        speed: 10,
        detectionRadius: 30,
        avoidanceAngle: 45,
        ...overrides,
    });
}

/**
 * Stopped remote robot at the origin (speed 10, detection radius 30)
 */
export function makeRemote(overrides: Partial<RobotInit> = {}): RemoteRobot {
    return new RemoteRobot({
        id: 'remote',
        x: 0,
        y: 0,
        speed: 10,
        detectionRadius: 30,
        ...overrides,
    });
}

export function makeObstacle(id: string, x: number, y: number, size: number): Obstacle {
    return new Obstacle({ id, x, y, size });
}

/**
 * Scene holding `entities` in order, added without placement checks
 */
export function sceneWith(...entities: SceneEntity[]): Scene {
    const scene = new Scene();
    for (const entity of entities) {
        scene.addEntity(entity);
    }
    return scene;
}
