/**
 * File system test helpers
 * Temporary directories and config files, removed again by cleanupTempPaths()
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import _ from 'lodash';

const cleanupRegistry: string[] = [];

/**
 * Create a temporary directory registered for cleanup
 *
 * @example
 * ```typescript
 * let testDir: string;
 *
 * beforeEach(async () => {
 *   testDir = await createTempDir('config');
 * });
 *
 * afterEach(async () => {
 *   await cleanupTempPaths();
 * });
 * ```
 */
export async function createTempDir(prefix = 'session-host-test'): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
    cleanupRegistry.push(dir);
    return dir;
}

/**
 * Write a file (objects are JSON encoded) into a directory, creating a temp directory when none is given
 */
export async function createTempFile(
    content: string | Record<string, unknown>,
    options: { filename?: string, directory?: string } = {}
): Promise<string> {
    const { filename = 'servers.json', directory } = options;
    const dir = directory ?? await createTempDir('temp-file');
    const filePath = join(dir, filename);
    const fileContent = _.isString(content) ? content : JSON.stringify(content, null, 2);
    await writeFile(filePath, fileContent, 'utf-8');
    return filePath;
}

export async function cleanupTempPaths(): Promise<void> {
    const paths = cleanupRegistry.splice(0, cleanupRegistry.length);
    await Promise.all(_.map(paths, path => rm(path, { recursive: true, force: true })));
}
