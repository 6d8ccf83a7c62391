/**
 * @module world/obstacle
 * @description Static axis-aligned square obstacle
 */

import { ValidationError } from '../../core/errors';
import type { Rect } from '../geometry/types';

export interface ObstacleInit {
    id: string;
    /** Top-left corner */
    x: number;
    y: number;
    /** Side length, > 0 */
    size: number;
}

export class Obstacle {
    readonly kind = 'obstacle' as const;
    readonly id: string;
    readonly x: number;
    readonly y: number;
    readonly size: number;

    constructor(init: ObstacleInit) {
        if (!(init.size > 0)) {
            throw new ValidationError(`Obstacle size must be > 0, got ${init.size}`, { size: init.size });
        }
        this.id = init.id;
        this.x = init.x;
        this.y = init.y;
        this.size = init.size;
    }

    bounds(): Rect {
        return { x: this.x, y: this.y, width: this.size, height: this.size };
    }
}
