/**
 * @module envs/ts
 * @description Single-link rate control with success/failure counts
 */

export * from './schema';
export * from './observation';
export * from './reward';
export * from './policy';
export * from './report';
export { TsAdapter } from './adapter';
