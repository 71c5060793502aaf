/**
 * @module envs
 * @description Environment variants
 */

export * as apb from './apb';
export * as obss from './obss';
export * as ts from './ts';

export { ApbAdapter } from './apb';
export { ObssAdapter } from './obss';
export { TsAdapter } from './ts';
