/**
 * @module adapter
 * @description Adapter interface, configuration and variant registry
 */

export type {
    RewardKind,
    Observation,
    RewardResult,
    StepSnapshot,
    VariantDefinition,
    FatalHandler,
    AdapterOptions,
    Adapter,
} from './adapter';
export { BaseAdapter, exitOnFatal } from './adapter';

export type { AdapterConfig } from './config';
export {
    DEFAULT_ADAPTER_CONFIG,
    createAdapterConfig,
    validateAdapterConfig,
    parseConfigJson,
} from './config';

export type { AdapterFactory } from './registry';
export { AdapterRegistry, createAdapterRegistry, defaultAdapterRegistry, createAdapter } from './registry';
