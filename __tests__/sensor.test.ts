/**
 * Sensor Cone Tests
 * Cone geometry and obstacle detection modes
 */

import { describe, it, expect } from 'vitest';
import {
    sensorHalfWidths,
    localSensorCone,
    sensorCone,
    obstaclesInCone,
    coneDetectsObstacle,
} from '../src/models/agents/sensor';
import { makeAutonomous, makeObstacle, sceneWith } from './test-utils';

describe('Sensor cone geometry', () => {
    it('should size the far edge by tan(30°) and cap the near edge', () => {
        const small = sensorHalfWidths(30);
        expect(small.far).toBeCloseTo(17.3205, 4);
        expect(small.near).toBeCloseTo(4.3301, 4);

        // far / 4 = 14.43 exceeds R / 3
        const large = sensorHalfWidths(100);
        expect(large.far).toBeCloseTo(57.735, 3);
        expect(large.near).toBeCloseTo(20 / 3, 10);
    });

    it('should collapse to the near edge for zero radius', () => {
        expect(sensorHalfWidths(0)).toEqual({ near: 0, far: 0 });
        const cone = localSensorCone(0);
        expect(cone.every(p => p.x === 20 && p.y === 0)).toBe(true);
    });

    it('should order local corners near-left, near-right, far-right, far-left', () => {
        const cone = localSensorCone(30);
        expect(cone).toHaveLength(4);
        expect(cone[0].x).toBe(20);
        expect(cone[0].y).toBeCloseTo(-4.3301, 4);
        expect(cone[1].x).toBe(20);
        expect(cone[1].y).toBeCloseTo(4.3301, 4);
        expect(cone[2].x).toBe(50);
        expect(cone[2].y).toBeCloseTo(17.3205, 4);
        expect(cone[3].x).toBe(50);
        expect(cone[3].y).toBeCloseTo(-17.3205, 4);
    });

    it('should rotate by heading and translate by position', () => {
        const cone = sensorCone({ x: 10, y: 10 }, 90, 30);
        // (20, -4.33) rotated 90° is (4.33, 20)
        expect(cone[0].x).toBeCloseTo(14.3301, 4);
        expect(cone[0].y).toBeCloseTo(30, 10);
        // (50, 17.32) rotated 90° is (-17.32, 50)
        expect(cone[2].x).toBeCloseTo(-7.3205, 4);
        expect(cone[2].y).toBeCloseTo(60, 10);
    });
});

describe('Obstacle detection', () => {
    const cone = sensorCone({ x: 0, y: 0 }, 0, 30);

    it('should find an obstacle inside the cone', () => {
        const obstacle = makeObstacle('o', 24, -5, 10);
        const world = sceneWith(obstacle);
        expect(obstaclesInCone(cone, world)).toEqual([obstacle]);
        expect(coneDetectsObstacle(cone, world)).toBe(true);
    });

    it('should ignore obstacles outside the cone bounding box', () => {
        const world = sceneWith(makeObstacle('o', 100, 100, 10));
        expect(coneDetectsObstacle(cone, world)).toBe(false);
        expect(coneDetectsObstacle(cone, world, 'bounds')).toBe(false);
    });

    it('should ignore robots inside the cone', () => {
        const other = makeAutonomous({ id: 'other', x: 35, y: 0 });
        const world = sceneWith(other);
        expect(coneDetectsObstacle(cone, world)).toBe(false);
        expect(coneDetectsObstacle(cone, world, 'bounds')).toBe(false);
    });

    it('should differ between polygon and bounds modes beside the cone', () => {
        // Inside the bounding rect (y up to 17.32) but above the upper cone edge
        const world = sceneWith(makeObstacle('o', 22, 12, 4));
        expect(coneDetectsObstacle(cone, world, 'polygon')).toBe(false);
        expect(coneDetectsObstacle(cone, world, 'bounds')).toBe(true);
    });

    it('should not detect an obstacle flush with the far edge', () => {
        // Far edge at x = 50; the obstacle starts exactly there
        const world = sceneWith(makeObstacle('o', 50, -5, 10));
        expect(coneDetectsObstacle(cone, world, 'polygon')).toBe(false);
        expect(coneDetectsObstacle(cone, world, 'bounds')).toBe(false);
    });

    it('should return every detected obstacle in scene order', () => {
        const near = makeObstacle('near', 22, -2, 4);
        const far = makeObstacle('far', 44, -2, 4);
        const world = sceneWith(far, makeObstacle('off', 0, 300, 10), near);
        expect(obstaclesInCone(cone, world).map(o => o.id)).toEqual(['far', 'near']);
    });
});
