/**
 * @module adapter/config-file
 * @description Load `<dir>/<env>/config.json` (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from '../core/errors';
import { parseConfigJson, type AdapterConfig } from './config';

/** Directory holding one `config.json` per environment variant */
export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL('../envs', import.meta.url));

/**
 * Path of the configuration file for an environment variant
 */
export function configFilePath(env: string, dir: string = DEFAULT_CONFIG_DIR): string {
    return path.join(dir, env, 'config.json');
}

/**
 * Read and parse the configuration file of an environment variant
 */
export function loadConfigFile(env: string, dir: string = DEFAULT_CONFIG_DIR): AdapterConfig {
    const file = configFilePath(env, dir);

    let text: string;
    try {
        text = fs.readFileSync(file, 'utf-8');
    } catch (error) {
        throw new ConfigError(`Cannot read configuration file ${file}`, {
            file,
            cause: error instanceof Error ? error.message : String(error),
        });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigError(`Configuration file ${file} is not valid JSON`, {
            file,
            cause: error instanceof Error ? error.message : String(error),
        });
    }

    return parseConfigJson(raw);
}
