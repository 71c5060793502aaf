/**
 * @module envs/obss
 * @description Multi-BSS spatial reuse: OBSS-PD and TX power control for a
 * VR uplink station
 */

export * from './schema';
export * from './observation';
export * from './reward';
export * from './policy';
export * from './report';
export { ObssAdapter } from './adapter';
