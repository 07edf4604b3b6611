/**
 * Server descriptor loading
 *
 * Reads the servers file, substitutes ${VAR} references from the host
 * environment and resolves every working directory against the
 * directory holding the config file, so spawned servers see the same
 * cwd whatever directory the host was started from.
 */

import { dirname, isAbsolute, resolve } from 'node:path';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/logger.js';
import { loadJsonConfig } from '../utils/config-loader.js';
import { ServersConfigSchema, type ServerDescriptor, type ServerEntry, type ServersConfig } from '../types/config.js';

/**
 * Substitute environment variables in a string. Supports ${VAR_NAME} syntax;
 * unknown variables are left as written.
 */
export function substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return _.replace(str, /\$\{([^}]+)\}/g, (match: string, varName: string) => {
        const value = env[varName];
        if(value === undefined) {
            logger.warn({ varName }, 'Environment variable not found, leaving unreplaced');
            return match;
        }
        return value;
    });
}

function substituteEntry(entry: ServerEntry, env: NodeJS.ProcessEnv): ServerEntry {
    const substituted: ServerEntry = { command: substituteEnvVars(entry.command, env) };
    if(entry.args) {
        substituted.args = _.map(entry.args, arg => substituteEnvVars(arg, env));
    }
    if(entry.env) {
        substituted.env = _.mapValues(entry.env, value => substituteEnvVars(value, env));
    }
    if(entry.cwd !== undefined) {
        substituted.cwd = substituteEnvVars(entry.cwd, env);
    }
    return substituted;
}

/**
 * Turn validated entries into frozen descriptors, preserving file order
 *
 * @param configDir - Absolute directory relative cwd values resolve against
 */
export function toServerDescriptors(
    config: ServersConfig,
    configDir: string,
    env: NodeJS.ProcessEnv = process.env
): ServerDescriptor[] {
    return _.map(_.toPairs(config.mcpServers), ([name, rawEntry]) => {
        const entry = substituteEntry(rawEntry, env);
        const cwd = entry.cwd === undefined
            ? configDir
            : (isAbsolute(entry.cwd) ? entry.cwd : resolve(configDir, entry.cwd));

        const descriptor: ServerDescriptor = {
            name,
            command: entry.command,
            args:    Object.freeze([...(entry.args ?? [])]),
            ...(entry.env ? { env: Object.freeze({ ...entry.env }) } : {}),
            cwd,
        };
        return Object.freeze(descriptor);
    });
}

/**
 * Load the ordered server descriptors from a config file
 *
 * @throws ConfigError on a missing or malformed file, or an entry lacking a command
 */
export async function loadServerDescriptors(configPath: string): Promise<ServerDescriptor[]> {
    const absolutePath = resolve(configPath);
    const config = await loadJsonConfig({ path: absolutePath, schema: ServersConfigSchema });
    const descriptors = toServerDescriptors(config, dirname(absolutePath));

    logger.debug({ configPath: absolutePath, serverCount: descriptors.length }, 'Loaded server descriptors');
    return descriptors;
}
