/**
 * Agent Model Tests
 * Motion integration, autonomous avoidance, remote-control state machine
 */

import { describe, it, expect } from 'vitest';
import {
    AutonomousRobot,
    orientationToHeading,
    ORIENTATION_HEADINGS,
} from '../src/models/agents';
import { emptyWorld, makeAutonomous, makeObstacle, makeRemote, sceneWith } from './test-utils';

describe('Orientation', () => {
    it('should map orientation indices to headings', () => {
        expect(orientationToHeading(0)).toBe(270);
        expect(orientationToHeading(1)).toBe(0);
        expect(orientationToHeading(2)).toBe(90);
        expect(orientationToHeading(3)).toBe(180);
    });

    it('should fall back to right for unknown indices', () => {
        expect(orientationToHeading(7)).toBe(ORIENTATION_HEADINGS.right);
        expect(orientationToHeading(-1)).toBe(0);
        expect(orientationToHeading(1.5)).toBe(0);
    });

    it('should start autonomous robots on their orientation heading', () => {
        expect(makeAutonomous({ orientation: 0 }).heading).toBe(270);
        expect(makeAutonomous({ orientation: 3 }).heading).toBe(180);
    });
});

describe('Motion integration', () => {
    it('should move a tenth of the speed along the heading each tick', () => {
        const robot = makeAutonomous({ speed: 10 });
        const result = robot.update(emptyWorld());

        expect(result.moved).toBe(true);
        expect(robot.position).toEqual({ x: 1, y: 0 });
    });

    it('should cover speed / 10 per tick in a straight line', () => {
        const robot = makeAutonomous({ speed: 10 });
        for (let i = 0; i < 5; i++) {
            robot.update(emptyWorld());
        }
        expect(robot.position.x).toBeCloseTo(5, 10);
        expect(robot.position.y).toBe(0);
        expect(robot.heading).toBe(0);
    });

    it('should follow the screen y axis for heading 90', () => {
        const robot = makeAutonomous({ orientation: 2, speed: 20 });
        robot.update(emptyWorld());
        expect(robot.position.x).toBeCloseTo(0, 10);
        expect(robot.position.y).toBeCloseTo(2, 10);
    });

    it('should not move at speed 0', () => {
        const robot = makeAutonomous({ speed: 0, x: 50, y: 60 });
        const result = robot.update(emptyWorld());

        expect(result.moved).toBe(false);
        expect(robot.position).toEqual({ x: 50, y: 60 });
    });

    it('should report bounds as a 40x40 square centered on the position', () => {
        const robot = makeAutonomous({ x: 100, y: 50 });
        expect(robot.bounds()).toEqual({ x: 80, y: 30, width: 40, height: 40 });
    });
});

describe('AutonomousRobot', () => {
    it('should be moving from creation', () => {
        expect(makeAutonomous().isMoving).toBe(true);
    });

    it('should turn by its avoidance angle when an obstacle enters the cone', () => {
        // After one tick the robot is at (1, 0); the cone spans x 21..51
        const robot = makeAutonomous({ avoidanceAngle: 45 });
        const world = sceneWith(robot, makeObstacle('o', 25, -5, 10));

        const result = robot.update(world);

        expect(robot.position).toEqual({ x: 1, y: 0 });
        expect(result.detected).toBe(true);
        expect(result.turned).toBe(true);
        expect(result.stopped).toBe(false);
        expect(robot.heading).toBe(45);
        expect(result.heading).toBe(45);
    });

    it('should normalize negative avoidance turns', () => {
        const robot = makeAutonomous({ avoidanceAngle: -30 });
        robot.update(sceneWith(makeObstacle('o', 25, -5, 10)));
        expect(robot.heading).toBe(330);
    });

    it('should keep its heading when nothing is detected', () => {
        const robot = makeAutonomous();
        const result = robot.update(sceneWith(makeObstacle('o', 200, 200, 10)));

        expect(result.detected).toBe(false);
        expect(result.turned).toBe(false);
        expect(robot.heading).toBe(0);
    });

    it('should not treat other robots as obstacles', () => {
        const robot = makeAutonomous();
        const other = makeAutonomous({ id: 'other', x: 35, y: 0, speed: 0 });
        const result = robot.update(sceneWith(robot, other));

        expect(result.detected).toBe(false);
        expect(robot.heading).toBe(0);
    });

    it('should use the requested detection mode', () => {
        // Beside the cone, inside its bounding rectangle
        const world = sceneWith(makeObstacle('o', 22, 12, 4));
        const robot = makeAutonomous({ speed: 0 });

        expect(robot.detectObstacle(world)).toBe(false);
        expect(robot.detectObstacle(world, 'bounds')).toBe(true);
        expect(robot.update(world, { detectionMode: 'bounds' }).turned).toBe(true);
    });

    it('should expose a pose snapshot', () => {
        const robot = new AutonomousRobot({
            id: 'robot-7',
            x: 12,
            y: 34,
            orientation: 2,
            speed: 3,
            detectionRadius: 20,
            avoidanceAngle: 90,
        });
        expect(robot.pose()).toEqual({
            id: 'robot-7',
            kind: 'autonomous',
            x: 12,
            y: 34,
            heading: 90,
            isMoving: true,
        });
    });
});

describe('RemoteRobot', () => {
    it('should start stopped, facing right, without rotation', () => {
        const robot = makeRemote();
        expect(robot.isMoving).toBe(false);
        expect(robot.heading).toBe(0);
        expect(robot.rotationDirection).toBe('none');
    });

    it('should not move while stopped', () => {
        const robot = makeRemote({ x: 5, y: 5 });
        const result = robot.update(emptyWorld());

        expect(result.moved).toBe(false);
        expect(result.detected).toBe(false);
        expect(robot.position).toEqual({ x: 5, y: 5 });
    });

    it('should move after moveForward and halt after stop', () => {
        const robot = makeRemote({ speed: 5 });
        robot.moveForward();
        robot.moveForward();
        expect(robot.isMoving).toBe(true);

        robot.update(emptyWorld());
        expect(robot.position).toEqual({ x: 0.5, y: 0 });

        robot.stop();
        robot.stop();
        expect(robot.isMoving).toBe(false);
        robot.update(emptyWorld());
        expect(robot.position).toEqual({ x: 0.5, y: 0 });
    });

    it('should stop itself in front of an obstacle', () => {
        const robot = makeRemote();
        const world = sceneWith(robot, makeObstacle('o', 25, -5, 10));
        robot.moveForward();

        const result = robot.update(world);

        expect(result.detected).toBe(true);
        expect(result.stopped).toBe(true);
        expect(result.turned).toBe(false);
        expect(robot.isMoving).toBe(false);
        expect(robot.position).toEqual({ x: 1, y: 0 });
        expect(robot.heading).toBe(0);

        // Stays put until commanded again
        expect(robot.update(world).moved).toBe(false);
        expect(robot.position).toEqual({ x: 1, y: 0 });
    });

    it('should only record rotation intent', () => {
        const robot = makeRemote();
        robot.rotateLeft();
        expect(robot.rotationDirection).toBe('left');
        expect(robot.heading).toBe(0);
    });

    it('should rotate one step per applyRotation call', () => {
        const robot = makeRemote();

        robot.rotateLeft();
        expect(robot.applyRotation(1)).toBe(true);
        expect(robot.heading).toBe(359);

        robot.rotateRight();
        robot.applyRotation(1);
        expect(robot.heading).toBe(0);
        robot.applyRotation(1);
        expect(robot.heading).toBe(1);
    });

    it('should not rotate without a direction or with a zero step', () => {
        const robot = makeRemote();
        expect(robot.applyRotation(5)).toBe(false);

        robot.rotateRight();
        expect(robot.applyRotation(0)).toBe(false);

        robot.stopRotation();
        expect(robot.rotationDirection).toBe('none');
        expect(robot.applyRotation(5)).toBe(false);
        expect(robot.heading).toBe(0);
    });
});
