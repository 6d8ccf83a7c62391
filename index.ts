/**
 * @packageDocumentation
 * @module arenabots
 *
 * Arenabots: tick-driven simulation of robots in a 2D arena with static obstacles
 *
 * Browser-safe: nothing here touches the file system.
 *
 * ## Modules
 * - `geometry` - Angles, point rotation, rectangles, convex polygon intersection
 * - `agents` - Robot variants, sensor cone, reaction policies
 * - `world` - Obstacles, scene registry, placement checks
 * - `engine` - `tickAll` and the `Simulation` controller
 * - `io` - Scene text format
 * - `core` - Logging and errors
 *
 * ## Usage Example
 * ```typescript
 * import { engine } from 'arenabots';
 *
 * const sim = new engine.Simulation({ tickIntervalMs: 10 });
 * sim.createAutonomousRobot({ x: 100, y: 100, orientation: 1, speed: 10, detectionRadius: 30, avoidanceAngle: 45 });
 * sim.createObstacle({ x: 300, y: 80, size: 40 });
 * sim.start();
 * ```
 */

export * as core from './src/core';
export * as geometry from './src/models/geometry';
export * as agents from './src/models/agents';
export * as world from './src/models/world';
export * as engine from './src/engine';
export * as io from './src/io';
export * as config from './src/config';

// ==================== Version ====================
export const VERSION = '1.0.0';
