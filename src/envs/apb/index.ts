/**
 * @module envs/apb
 * @description Addition calculator: observe two addends, answer their sum
 */

export * from './schema';
export * from './observation';
export * from './reward';
export * from './policy';
export { ApbAdapter } from './adapter';
