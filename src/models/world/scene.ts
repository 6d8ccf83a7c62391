/**
 * @module world/scene
 * @description Ordered registry of robots and obstacles with overlap queries
 *
 * Entities are held by reference, so a robot's pose is visible here as soon
 * as its update finishes. Iteration and query results follow insertion order.
 */

import { ValidationError } from '../../core/errors';
import type { Agent } from '../agents/agent';
import type { SpatialQuery } from '../agents/types';
import { rectsIntersect } from '../geometry/shapes';
import type { Rect } from '../geometry/types';
import type { Obstacle } from './obstacle';

// ==================== Types ====================

export type SceneEntity = Agent | Obstacle;

export type IdPrefix = 'robot' | 'obstacle';

export type ArenaBounds = Rect;

export const DEFAULT_ARENA_BOUNDS: ArenaBounds = {
    x: 0,
    y: 0,
    width: 1500,
    height: 600,
};

export function isAgent(entity: SceneEntity): entity is Agent {
    return entity.kind !== 'obstacle';
}

export function isObstacle(entity: SceneEntity): entity is Obstacle {
    return entity.kind === 'obstacle';
}

// ==================== Scene ====================

export class Scene implements SpatialQuery<SceneEntity> {
    readonly arena: ArenaBounds;

    private entities = new Map<string, SceneEntity>();
    private counters: Record<IdPrefix, number> = { robot: 0, obstacle: 0 };

    constructor(arena: ArenaBounds = DEFAULT_ARENA_BOUNDS) {
        this.arena = { ...arena };
    }

    get size(): number {
        return this.entities.size;
    }

    /**
     * Next free id with the given prefix (`robot-1`, `obstacle-3`, ...)
     *
     * Counters are never reset, so ids stay unique across clears.
     */
    nextId(prefix: IdPrefix): string {
        let id: string;
        do {
            this.counters[prefix] += 1;
            id = `${prefix}-${this.counters[prefix]}`;
        } while (this.entities.has(id));
        return id;
    }

    addEntity(entity: SceneEntity): void {
        if (this.entities.has(entity.id)) {
            throw new ValidationError(`Duplicate entity id: ${entity.id}`, { id: entity.id });
        }
        this.entities.set(entity.id, entity);
    }

    removeEntity(id: string): boolean {
        return this.entities.delete(id);
    }

    removeAllEntities(): void {
        this.entities.clear();
    }

    get(id: string): SceneEntity | undefined {
        return this.entities.get(id);
    }

    has(id: string): boolean {
        return this.entities.has(id);
    }

    all(): SceneEntity[] {
        return [...this.entities.values()];
    }

    agents(): Agent[] {
        return this.all().filter(isAgent);
    }

    obstacles(): Obstacle[] {
        return this.all().filter(isObstacle);
    }

    /**
     * Entities whose bounds overlap `region`
     */
    query(region: Rect): SceneEntity[] {
        return this.all().filter(entity => rectsIntersect(entity.bounds(), region));
    }
}
