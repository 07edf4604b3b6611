#!/usr/bin/env node
/**
 * mcp-session-host CLI entry point
 */

import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createProgram } from './program.js';
import { errorMessage } from './types/errors.js';

interface PackageJson {
    version:     string
    description: string
}

const packageJson = JSON.parse(
    await readFile(join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json'), 'utf-8')
) as PackageJson;

const program = createProgram({
    version:     packageJson.version,
    description: packageJson.description,
    trapSignals: true,
});

try {
    await program.parseAsync();
} catch (error) {
    // eslint-disable-next-line no-console -- CLI error message to stderr is appropriate
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
}
