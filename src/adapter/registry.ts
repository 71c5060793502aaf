/**
 * @module adapter/registry
 * @description Variant lookup by configured environment name
 */

import { AdapterNotFoundError } from '../core/errors';
import { ApbAdapter } from '../envs/apb/adapter';
import { ObssAdapter } from '../envs/obss/adapter';
import { TsAdapter } from '../envs/ts/adapter';
import type { Adapter, AdapterOptions } from './adapter';
import type { AdapterConfig } from './config';

export type AdapterFactory = (config: AdapterConfig, options?: AdapterOptions) => Adapter;

export class AdapterRegistry {
    private factories: Map<string, AdapterFactory> = new Map();

    /**
     * Register a variant under its environment name
     */
    register(env: string, factory: AdapterFactory): this {
        this.factories.set(env, factory);
        return this;
    }

    get(env: string): AdapterFactory | undefined {
        return this.factories.get(env);
    }

    has(env: string): boolean {
        return this.factories.has(env);
    }

    /**
     * List all registered environment names
     */
    list(): string[] {
        return Array.from(this.factories.keys());
    }

    /**
     * Construct the variant named by `config.env`
     *
     * @throws AdapterNotFoundError when no variant has that name
     */
    create(config: AdapterConfig, options?: AdapterOptions): Adapter {
        const factory = this.factories.get(config.env);
        if (!factory) {
            throw new AdapterNotFoundError(config.env, this.list());
        }
        return factory(config, options);
    }
}

/**
 * Registry holding the built-in variants
 */
export function createAdapterRegistry(): AdapterRegistry {
    return new AdapterRegistry()
        .register('apb', (config, options) => new ApbAdapter(config, options))
        .register('obss', (config, options) => new ObssAdapter(config, options))
        .register('ts', (config, options) => new TsAdapter(config, options));
}

export const defaultAdapterRegistry = createAdapterRegistry();

export function createAdapter(config: AdapterConfig, options?: AdapterOptions): Adapter {
    return defaultAdapterRegistry.create(config, options);
}
