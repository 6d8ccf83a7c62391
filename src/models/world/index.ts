/**
 * @module src/models/world
 * @description Obstacles, the scene registry, and the placement layer
 */

export { Obstacle, type ObstacleInit } from './obstacle';

export {
    Scene,
    DEFAULT_ARENA_BOUNDS,
    isAgent,
    isObstacle,
    type SceneEntity,
    type IdPrefix,
    type ArenaBounds,
} from './scene';

export {
    validateRemoteRobotParams,
    validateAutonomousRobotParams,
    validateObstacleParams,
    robotArea,
    findConflict,
    placementMessage,
    placeAutonomousRobot,
    placeRemoteRobot,
    placeObstacle,
    type RemoteRobotParams,
    type AutonomousRobotParams,
    type ObstacleParams,
} from './placement';
