/**
 * @module src/models/agents
 * @description Robot variants, sensor cone, and reaction policies
 *
 * Contains:
 * - Robot: shared pose state and 10%-per-tick motion integration
 * - AutonomousRobot: continuous drive, turns by its avoidance angle on detection
 * - RemoteRobot: command-driven, stops on detection
 * - sensor: trapezoidal forward cone and obstacle detection
 */

export type {
    AgentKind,
    EntityKind,
    RotationDirection,
    DetectionMode,
    OrientationName,
    SensedEntity,
    SpatialQuery,
    AgentPose,
    UpdateOptions,
    AgentUpdate,
} from './types';

export {
    ROBOT_RADIUS,
    INTEGRATION_FACTOR,
    SENSOR_HALF_ANGLE_DEG,
    ORIENTATION_HEADINGS,
    ORIENTATION_ORDER,
    orientationToHeading,
} from './constants';

export {
    sensorHalfWidths,
    localSensorCone,
    sensorCone,
    obstaclesInCone,
    coneDetectsObstacle,
} from './sensor';

export { Robot, type RobotInit } from './robot';
export { AutonomousRobot, type AutonomousRobotInit } from './autonomous';
export { RemoteRobot } from './remote';
export type { Agent } from './agent';
