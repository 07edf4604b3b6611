/**
 * Configuration file path utilities
 * Provides cross-platform paths for user config files
 */

import envPaths from 'env-paths';
import { join } from 'node:path';

// suffix: '' removes the default '-nodejs' suffix
const paths = envPaths('mcp-session-host', { suffix: '' });

/**
 * Directory where servers.json is looked up by default
 */
export function getConfigDir(): string {
    return paths.data;
}

/**
 * Full path of the default servers config file
 */
export function getServersConfigPath(): string {
    return join(paths.data, 'servers.json');
}
