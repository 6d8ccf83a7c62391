import type { AutonomousRobot } from './autonomous';
import type { RemoteRobot } from './remote';

/**
 * Either robot variant; discriminate on `kind`
 */
export type Agent = AutonomousRobot | RemoteRobot;
