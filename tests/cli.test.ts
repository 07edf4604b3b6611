/**
 * CLI Tests - commands run through createProgram() against in-memory stub servers
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import _ from 'lodash';
import type { Command } from 'commander';
import { createProgram } from '../src/program.js';
import { getConfigDir, getServersConfigPath } from '../src/utils/config-paths.js';
import { StubServerFarm, textResult } from './fixtures/stub-mcp-server.js';
import { cleanupTempPaths, createTempFile } from './helpers/fs-utils.js';

const rootDir = join(dirname(fileURLToPath(import.meta.url)), '..');

function createTestProgram(): { program: Command, output: string[] } {
    const output: string[] = [];
    const farm = new StubServerFarm({
        ok: { tools: [{ name: 'echo', description: 'Echo the text argument' }, { name: 'ping' }] },
    });
    const program = createProgram({
        version:        '1.2.3',
        print:          (line) => {
            output.push(line);
        },
        managerOptions: { createTransport: farm.createTransport, killGraceMs: 1000 },
    });
    program.exitOverride();
    return { program, output };
}

describe('CLI Package Metadata', () => {
    it('has a version and description in package.json', async () => {
        const pkg = JSON.parse(await readFile(join(rootDir, 'package.json'), 'utf-8')) as { version?: string, description?: string };

        expect(pkg.version).toMatch(/^\d+\.\d+\.\d+/);
        expect(_.isString(pkg.description)).toBe(true);
    });

    it('has a bin entry for mcp-session-host', async () => {
        const pkg = JSON.parse(await readFile(join(rootDir, 'package.json'), 'utf-8')) as { bin?: Record<string, string> };

        expect(pkg.bin?.['mcp-session-host']).toBe('./dist/cli.js');
    });
});

describe('CLI Commands', () => {
    afterEach(async () => {
        await cleanupTempPaths();
    });

    it('list-tools prints every qualified tool name', async () => {
        const configPath = await createTempFile({ mcpServers: { good: { command: 'ok' } } });
        const { program, output } = createTestProgram();

        await program.parseAsync(['list-tools', '-c', configPath], { from: 'user' });

        expect(output).toEqual([
            '\nTools (2):\n',
            '  good.echo',
            '    Echo the text argument',
            '  good.ping',
            '    ping tool',
        ]);
    });

    it('list-tools --json prints function definitions', async () => {
        const configPath = await createTempFile({ mcpServers: { good: { command: 'ok' } } });
        const { program, output } = createTestProgram();

        await program.parseAsync(['list-tools', '--json', '--config', configPath], { from: 'user' });

        expect(output).toHaveLength(1);
        const definitions = JSON.parse(output[0] ?? '[]') as { function: { name: string } }[];
        expect(_.map(definitions, 'function.name')).toEqual(['good.echo', 'good.ping']);
    });

    it('call prints the text result of a tool', async () => {
        const configPath = await createTempFile({ mcpServers: { good: { command: 'ok' } } });
        const { program, output } = createTestProgram();

        await program.parseAsync(['call', 'good.echo', '{"text":"hi"}', '-c', configPath], { from: 'user' });

        expect(output).toEqual(['hi']);
    });

    it('call rejects arguments that are not a JSON object', async () => {
        const { program } = createTestProgram();

        await expect(program.parseAsync(['call', 'good.echo', '{oops'], { from: 'user' })).rejects.toThrow(/^Tool arguments are not valid JSON: /);
        await expect(createTestProgram().program.parseAsync(['call', 'good.echo', '[1]'], { from: 'user' })).rejects.toThrow('Tool arguments must be a JSON object');
    });

    it('call fails for an unknown tool', async () => {
        const configPath = await createTempFile({ mcpServers: { good: { command: 'ok' } } });
        const { program } = createTestProgram();

        await expect(program.parseAsync(['call', 'good.nope', '-c', configPath], { from: 'user' })).rejects.toThrow('Tool "good.nope" not found');
    });

    it('validate prints each server descriptor', async () => {
        const configPath = await createTempFile({
            mcpServers: {
                filesystem: { command: 'fsd', args: ['--root', '/data'], env: { TOKEN: 'test-secret' } },
            },
        });
        const { program, output } = createTestProgram();

        await program.parseAsync(['validate', '-c', configPath], { from: 'user' });

        expect(output).toEqual([
            'Configuration is valid (1 servers)\n',
            '  filesystem',
            '    Command: fsd --root /data',
            `    Cwd:     ${dirname(configPath)}`,
            '    Env vars: TOKEN',
        ]);
    });

    it('validate fails on a malformed file', async () => {
        const configPath = await createTempFile({ mcpServers: { broken: { command: '' } } });
        const { program } = createTestProgram();

        await expect(program.parseAsync(['validate', '-c', configPath], { from: 'user' })).rejects.toThrow('Command cannot be empty');
    });

    it('config-path prints the config directory or the servers file', async () => {
        const first = createTestProgram();
        await first.program.parseAsync(['config-path'], { from: 'user' });

        const second = createTestProgram();
        await second.program.parseAsync(['config-path', '-v'], { from: 'user' });

        expect(first.output).toEqual([getConfigDir()]);
        expect(second.output).toEqual([getServersConfigPath()]);
    });

    it.each([
        ['SIGINT', 130],
        ['SIGTERM', 143],
    ] as const)('cleans up and exits with %s status %i', async (signal, code) => {
        const configPath = await createTempFile({ mcpServers: { good: { command: 'ok' } } });
        const exit = vi.fn();
        let markStarted: () => void = () => undefined;
        const started = new Promise<void>((resolve) => {
            markStarted = resolve;
        });
        const farm = new StubServerFarm({
            ok: {
                tools: [{
                    name:    'block',
                    handler: async () => {
                        markStarted();
                        await new Promise(resolve => setTimeout(resolve, 300));
                        return textResult('done');
                    },
                }],
            },
        });
        const program = createProgram({
            print:          () => undefined,
            trapSignals:    true,
            exit,
            managerOptions: { createTransport: farm.createTransport, killGraceMs: 1000 },
        });
        program.exitOverride();

        const run = program.parseAsync(['call', 'good.block', '-c', configPath], { from: 'user' });
        await started;
        const listener = process.listeners(signal).at(-1);
        listener?.(signal);

        await expect(run).rejects.toThrow('Tool call good.block failed');
        await vi.waitFor(() => {
            expect(exit).toHaveBeenCalledWith(code);
        });
        expect(process.listeners(signal)).not.toContain(listener);
    });
});
