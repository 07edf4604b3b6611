/**
 * Command definitions for the mcp-session-host CLI
 *
 * Commands:
 * - list-tools: connect every configured server and print the tool catalog
 * - call <tool> [json]: connect, call one tool, print its text result
 * - validate: parse the servers file and print the descriptors
 * - config-path: show where the default servers file lives
 */

import { Command } from 'commander';
import _ from 'lodash';
import { z } from 'zod';
import { SessionManager, type SessionManagerOptions } from './backend/session-manager.js';
import { loadServerDescriptors } from './backend/server-config.js';
import { getConfigDir, getServersConfigPath } from './utils/config-paths.js';
import { dynamicLogger as logger } from './utils/logger.js';
import { errorMessage } from './types/errors.js';

export interface ProgramOptions {
    name?:           string
    version?:        string
    description?:    string
    /** Line writer for command output (default: stdout) */
    print?:          (line: string) => void
    managerOptions?: SessionManagerOptions
    /** Clean up and exit on SIGINT/SIGTERM while servers are running */
    trapSignals?:    boolean
    /** Process exit used after a trapped signal (default: process.exit) */
    exit?:           (code: number) => void
}

// Exit status of a process ended by a signal: 128 + signal number
const SIGNAL_EXIT_CODES = {
    SIGINT:  130,
    SIGTERM: 143,
} as const;

type TrappedSignal = keyof typeof SIGNAL_EXIT_CODES;

const ToolArgumentsSchema = z.record(z.string(), z.unknown());

interface ConfigOption {
    config?: string
}

function parseArguments(json: string | undefined): Record<string, unknown> {
    if(json === undefined) {
        return {};
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (error) {
        throw new Error(`Tool arguments are not valid JSON: ${errorMessage(error)}`);
    }
    const result = ToolArgumentsSchema.safeParse(parsed);
    if(!result.success) {
        throw new Error('Tool arguments must be a JSON object');
    }
    return result.data;
}

export function createProgram(options: ProgramOptions = {}): Command {
    const print = options.print ?? ((line: string) => {
        process.stdout.write(`${line}\n`);
    });
    const exit = options.exit ?? ((code: number) => {
        process.exit(code);
    });

    const withManager = async <T>(configPath: string, run: (manager: SessionManager) => Promise<T>): Promise<T> => {
        const manager = new SessionManager(options.managerOptions);

        const onSignal = (signal: TrappedSignal): void => {
            logger.info({ signal }, 'Received signal, cleaning up');
            void manager.cleanup().then(() => {
                exit(SIGNAL_EXIT_CODES[signal]);
            });
        };
        const onSigint = (): void => {
            onSignal('SIGINT');
        };
        const onSigterm = (): void => {
            onSignal('SIGTERM');
        };
        if(options.trapSignals) {
            process.once('SIGINT', onSigint);
            process.once('SIGTERM', onSigterm);
        }

        try {
            await manager.loadServers(configPath);
            return await run(manager);
        } finally {
            await manager.cleanup();
            if(options.trapSignals) {
                process.off('SIGINT', onSigint);
                process.off('SIGTERM', onSigterm);
            }
        }
    };

    const program = new Command();

    program
        .name(options.name ?? 'mcp-session-host')
        .description(options.description ?? 'Run stdio MCP tool servers behind one namespaced tool catalog')
        .version(options.version ?? '0.0.0');

    program
        .command('list-tools')
        .description('Connect every configured server and list its tools')
        .option('-c, --config <path>', 'Servers config file', getServersConfigPath())
        .option('--json', 'Print function-calling tool definitions as JSON')
        .action(async (opts: ConfigOption & { json?: boolean }) => {
            await withManager(opts.config ?? getServersConfigPath(), async (manager) => {
                if(opts.json) {
                    print(JSON.stringify(manager.getToolDefinitions(), null, 2));
                    return;
                }
                const tools = manager.listTools();
                print(`\nTools (${tools.length}):\n`);
                for(const tool of tools) {
                    print(`  ${tool.qualifiedName}`);
                    if(tool.description) {
                        print(`    ${tool.description}`);
                    }
                }
            });
        });

    program
        .command('call')
        .description('Call one tool and print its text result')
        .argument('<tool>', 'Qualified tool name, e.g. filesystem.read')
        .argument('[json]', 'Tool arguments as a JSON object')
        .option('-c, --config <path>', 'Servers config file', getServersConfigPath())
        .action(async (toolName: string, json: string | undefined, opts: ConfigOption) => {
            const args = parseArguments(json);
            const text = await withManager(opts.config ?? getServersConfigPath(), manager => manager.callTool(toolName, args));
            print(text);
        });

    program
        .command('validate')
        .description('Validate the servers config file')
        .option('-c, --config <path>', 'Servers config file', getServersConfigPath())
        .action(async (opts: ConfigOption) => {
            const descriptors = await loadServerDescriptors(opts.config ?? getServersConfigPath());
            print(`Configuration is valid (${descriptors.length} servers)\n`);
            for(const descriptor of descriptors) {
                print(`  ${descriptor.name}`);
                print(`    Command: ${_.trim(`${descriptor.command} ${descriptor.args.join(' ')}`)}`);
                print(`    Cwd:     ${descriptor.cwd}`);
                if(descriptor.env && _.keys(descriptor.env).length > 0) {
                    print(`    Env vars: ${_.keys(descriptor.env).join(', ')}`);
                }
            }
        });

    program
        .command('config-path')
        .description('Show the configuration directory path')
        .option('-v, --verbose', 'Show the full path of the servers file')
        .action((opts: { verbose?: boolean }) => {
            print(opts.verbose ? getServersConfigPath() : getConfigDir());
        });

    return program;
}
