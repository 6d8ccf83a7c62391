/**
 * @module src/engine
 * @description Tick scheduler and simulation controller
 */

export { tickAgent, tickAll, type TickOptions, type TickReport } from './tick';
export { Simulation } from './simulation';
