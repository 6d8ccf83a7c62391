/**
 * @module engine/tick
 * @description Discrete update step: advance every agent exactly once
 *
 * Agents are visited in the order given (scene insertion order). Each update
 * runs to completion before the next begins and touches only its own robot;
 * obstacles are read through the spatial query.
 */

import type { Agent } from '../models/agents/agent';
import type { AgentUpdate, DetectionMode, SpatialQuery } from '../models/agents/types';

// ==================== Types ====================

export interface TickOptions {
    detectionMode?: DetectionMode;
    /** Degrees per tick for remote robots with a rotation direction set */
    remoteRotationStep?: number;
}

export interface TickReport {
    updates: AgentUpdate[];
    detections: number;
    avoidanceTurns: number;
    safetyStops: number;
}

const DEFAULT_ROTATION_STEP = 1;

// ==================== Tick ====================

/**
 * Advance one agent by one tick
 *
 * Remote robots first apply their pending rotation increment, then move if
 * they are in the Moving state.
 */
export function tickAgent(agent: Agent, world: SpatialQuery, options: TickOptions = {}): AgentUpdate {
    const updateOptions = { detectionMode: options.detectionMode };

    switch (agent.kind) {
        case 'autonomous':
            return agent.update(world, updateOptions);
        case 'remote': {
            const rotated = agent.applyRotation(options.remoteRotationStep ?? DEFAULT_ROTATION_STEP);
            const result = agent.update(world, updateOptions);
            return { ...result, rotated, heading: agent.heading };
        }
    }
}

/**
 * Advance every agent by one tick
 */
export function tickAll(
    agents: readonly Agent[],
    world: SpatialQuery,
    options: TickOptions = {}
): TickReport {
    const report: TickReport = {
        updates: [],
        detections: 0,
        avoidanceTurns: 0,
        safetyStops: 0,
    };

    for (const agent of agents) {
        const update = tickAgent(agent, world, options);
        report.updates.push(update);
        if (update.detected) report.detections++;
        if (update.turned) report.avoidanceTurns++;
        if (update.stopped) report.safetyStops++;
    }

    return report;
}
