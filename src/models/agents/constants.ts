import type { OrientationName } from './types';

/** Drawn radius of every robot; also the near edge of the sensor cone */
export const ROBOT_RADIUS = 20;

/** Fraction of the remaining distance to the heading target covered per tick */
export const INTEGRATION_FACTOR = 0.1;

/** Half-angle of the sensor cone's far edge, in degrees */
export const SENSOR_HALF_ANGLE_DEG = 30;

export const ORIENTATION_HEADINGS: Record<OrientationName, number> = {
    top: 270,
    right: 0,
    bottom: 90,
    left: 180,
};

/** Import/dialog index order */
export const ORIENTATION_ORDER: readonly OrientationName[] = ['top', 'right', 'bottom', 'left'];

/**
 * Heading for an orientation index (0 = top, 1 = right, 2 = bottom, 3 = left)
 *
 * Unknown indices fall back to right.
 */
export function orientationToHeading(index: number): number {
    const name = Number.isInteger(index) ? ORIENTATION_ORDER[index] : undefined;
    return name === undefined ? ORIENTATION_HEADINGS.right : ORIENTATION_HEADINGS[name];
}
