/**
 * Shared Configuration Loading Utility
 *
 * Provides generic config loading with:
 * - JSON parsing
 * - Zod schema validation
 * - Every failure reported as a ConfigError naming the file
 */

import { readFile } from 'node:fs/promises';
import type { ZodType, ZodTypeDef } from 'zod';
import { ZodError } from 'zod';
import _ from 'lodash';
import { dynamicLogger as logger } from './logger.js';
import { ConfigError, errorMessage } from '../types/errors.js';

/**
 * Options for loading JSON configuration
 */
export interface LoadJsonConfigOptions<T> {
    /** Path to the configuration file */
    path: string

    /** Zod schema for validation */
    schema: ZodType<T, ZodTypeDef, unknown>
}

/**
 * Load and validate a JSON configuration file
 *
 * @throws ConfigError if the file is missing or unreadable, is invalid JSON, or fails validation
 *
 * @example
 * ```typescript
 * const config = await loadJsonConfig({
 *   path: '/path/to/servers.json',
 *   schema: ServersConfigSchema,
 * });
 * ```
 */
export async function loadJsonConfig<T>(options: LoadJsonConfigOptions<T>): Promise<T> {
    const { path, schema } = options;

    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (error) {
        const missing = _.isError(error) && 'code' in error && error.code === 'ENOENT';
        const reason = missing ? 'file not found' : errorMessage(error);
        throw new ConfigError(path, `Cannot read config file ${path}: ${reason}`, error);
    }

    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error) {
        throw new ConfigError(path, `Invalid JSON in config file ${path}: ${errorMessage(error)}`, error);
    }

    try {
        return schema.parse(data);
    } catch (error) {
        if(error instanceof ZodError) {
            logger.error({ error: error.issues, configPath: path }, 'Invalid configuration file');
            const errorMessages = _.map(
                error.issues,
                issue => `${_.join(issue.path, '.')}: ${issue.message}`
            );
            throw new ConfigError(path, `Invalid configuration in ${path}: ${errorMessages.join(', ')}`, error);
        }
        throw new ConfigError(path, `Invalid configuration in ${path}: ${errorMessage(error)}`, error);
    }
}
