/**
 * @module engine/simulation
 * @description Simulation controller: cadence, pause/resume, commands, logging
 *
 * Wraps a {@link Scene} and drives {@link tickAll} on a fixed interval.
 * Stopping only ever happens between ticks; a stopped simulation keeps its
 * state and resumes from the same point.
 */

import { isArenaError, NotFoundError } from '../core/errors';
import { MultiLogger, type ArenaEventType, type Logger, type LogLevel, type ReportLogInput } from '../core/logging';
import { createArenaConfig, type ArenaConfig, type ArenaConfigInput } from '../config';
import type { AgentPose } from '../models/agents/types';
import type { AutonomousRobot } from '../models/agents/autonomous';
import type { RemoteRobot } from '../models/agents/remote';
import type { Obstacle } from '../models/world/obstacle';
import {
    placeAutonomousRobot,
    placeObstacle,
    placeRemoteRobot,
    type AutonomousRobotParams,
    type ObstacleParams,
    type RemoteRobotParams,
} from '../models/world/placement';
import { Scene } from '../models/world/scene';
import { importScene, type ImportResult } from '../io/scene-format';
import { tickAll, type TickReport } from './tick';

export class Simulation {
    readonly config: ArenaConfig;
    readonly scene: Scene;

    private logger: Logger;
    private timer: ReturnType<typeof setInterval> | null = null;
    private ticks = 0;
    private selectedId: string | null = null;
    private totals = { detections: 0, avoidanceTurns: 0, safetyStops: 0 };

    constructor(config: ArenaConfigInput = {}, logger: Logger = new MultiLogger([])) {
        this.config = createArenaConfig(config);
        this.scene = new Scene(this.config.arena);
        this.logger = logger;
    }

    // ==================== Lifecycle ====================

    get isRunning(): boolean {
        return this.timer !== null;
    }

    get tickCount(): number {
        return this.ticks;
    }

    /**
     * Start or continue ticking every `tickIntervalMs`
     */
    start(): void {
        if (this.timer !== null) return;
        this.timer = setInterval(() => {
            this.tick();
        }, this.config.tickIntervalMs);
        this.emit('simulation-started', 'info', `Simulation started at tick ${this.ticks}`);
    }

    stop(): void {
        if (this.timer === null) return;
        clearInterval(this.timer);
        this.timer = null;
        this.emit('simulation-stopped', 'info', `Simulation stopped at tick ${this.ticks}`);
    }

    /**
     * Advance every robot by one tick
     */
    tick(): TickReport {
        const agents = this.scene.agents();
        const report = tickAll(agents, this.scene, {
            detectionMode: this.config.detectionMode,
            remoteRotationStep: this.config.remoteRotationStep,
        });
        this.ticks++;

        this.totals.detections += report.detections;
        this.totals.avoidanceTurns += report.avoidanceTurns;
        this.totals.safetyStops += report.safetyStops;

        this.logger.logTick({ tick: this.ticks, poses: agents.map(agent => agent.pose()) });

        for (const update of report.updates) {
            if (update.detected) {
                this.emit('obstacle-detected', 'debug', `${update.id} detected an obstacle`, update.id);
            }
            if (update.turned) {
                this.emit('avoidance-turn', 'debug', `${update.id} turned to ${update.heading.toFixed(1)}`, update.id, {
                    heading: update.heading,
                });
            }
            if (update.stopped) {
                this.emit('safety-stop', 'info', `${update.id} stopped in front of an obstacle`, update.id, {
                    x: update.position.x,
                    y: update.position.y,
                });
            }
        }

        return report;
    }

    poses(): AgentPose[] {
        return this.scene.agents().map(agent => agent.pose());
    }

    // ==================== Creation ====================

    createAutonomousRobot(params: AutonomousRobotParams): AutonomousRobot {
        return this.place('robot', () => placeAutonomousRobot(this.scene, params));
    }

    createRemoteRobot(params: RemoteRobotParams): RemoteRobot {
        return this.place('robot', () => placeRemoteRobot(this.scene, params));
    }

    createObstacle(params: ObstacleParams): Obstacle {
        return this.place('obstacle', () => placeObstacle(this.scene, params));
    }

    private place<T extends { id: string }>(subject: 'robot' | 'obstacle', create: () => T): T {
        try {
            const entity = create();
            this.emit('entity-placed', 'info', `Placed ${entity.id}`, entity.id);
            return entity;
        } catch (error) {
            if (isArenaError(error)) {
                this.emit('placement-rejected', 'warn', error.message, undefined, { subject, code: error.code });
            }
            throw error;
        }
    }

    /**
     * Import a scene description; rejected blocks are logged and skipped
     */
    importScene(text: string): ImportResult {
        const result = importScene(this.scene, text);
        for (const entity of result.placed) {
            this.emit('entity-placed', 'info', `Placed ${entity.id}`, entity.id);
        }
        for (const warning of result.warnings) {
            this.emit('import-warning', 'warn', warning.message, undefined, { code: warning.code });
        }
        return result;
    }

    /**
     * Remove every entity and drop the selection
     */
    clear(): void {
        this.scene.removeAllEntities();
        this.selectedId = null;
        this.emit('scene-cleared', 'info', 'Scene cleared');
    }

    // ==================== Remote Commands ====================

    /**
     * @throws NotFoundError if `id` is not a remote robot in the scene
     */
    selectRobot(id: string): RemoteRobot {
        const entity = this.scene.get(id);
        if (entity === undefined || entity.kind !== 'remote') {
            throw new NotFoundError(`No remote robot with id ${id}`, { id });
        }
        this.selectedId = id;
        return entity;
    }

    /**
     * Selected remote robot, if it is still in the scene
     */
    get selectedRobot(): RemoteRobot | null {
        if (this.selectedId === null) return null;
        const entity = this.scene.get(this.selectedId);
        return entity !== undefined && entity.kind === 'remote' ? entity : null;
    }

    /** Only while running */
    moveRobot(): boolean {
        const robot = this.selectedRobot;
        if (robot === null || !this.isRunning) return false;
        robot.moveForward();
        return true;
    }

    /** Only while running */
    rotateRobotLeft(): boolean {
        const robot = this.selectedRobot;
        if (robot === null || !this.isRunning) return false;
        robot.rotateLeft();
        return true;
    }

    /** Only while running */
    rotateRobotRight(): boolean {
        const robot = this.selectedRobot;
        if (robot === null || !this.isRunning) return false;
        robot.rotateRight();
        return true;
    }

    stopRobot(): boolean {
        const robot = this.selectedRobot;
        if (robot === null) return false;
        robot.stop();
        return true;
    }

    stopRobotRotation(): boolean {
        const robot = this.selectedRobot;
        if (robot === null) return false;
        robot.stopRotation();
        return true;
    }

    // ==================== Reporting ====================

    report(): ReportLogInput {
        return {
            totalTicks: this.ticks,
            agents: this.scene.agents().length,
            obstacles: this.scene.obstacles().length,
            ...this.totals,
            config: {
                tickIntervalMs: this.config.tickIntervalMs,
                detectionMode: this.config.detectionMode,
                remoteRotationStep: this.config.remoteRotationStep,
                arena: this.config.arena,
            },
        };
    }

    /**
     * Stop ticking, log the final report, and release the logger
     */
    close(): ReportLogInput {
        this.stop();
        const report = this.report();
        this.logger.logReport(report);
        this.logger.flush();
        this.logger.close();
        return report;
    }

    private emit(
        event: ArenaEventType,
        level: LogLevel,
        message: string,
        entityId?: string,
        details?: Record<string, unknown>
    ): void {
        this.logger.logEvent({ tick: this.ticks, event, level, message, entityId, details });
    }
}
