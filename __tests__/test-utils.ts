/**
 * Test Utilities
 * Common helpers for adapter tests
 */

import type { AdapterOptions, FatalHandler } from '../src/adapter/adapter';
import { createAdapterConfig, type AdapterConfig } from '../src/adapter/config';
import { MemoryLogger } from '../src/core/logging';

/**
 * Fatal handler that throws instead of exiting the test process
 */
export const throwOnFatal: FatalHandler = (error) => {
    throw error;
};

/**
 * Adapter configuration for an environment variant
 */
export function configFor(env: string, overrides: Partial<AdapterConfig> = {}): AdapterConfig {
    return createAdapterConfig({ env, ...overrides });
}

/**
 * Adapter options with an in-memory logger and a throwing fatal handler
 */
export function testOptions(env: string): AdapterOptions & { logger: MemoryLogger } {
    return { logger: new MemoryLogger({ env }), onFatal: throwOnFatal };
}
