/**
 * Session Manager
 *
 * Public face of the session host:
 * - loadServers(): connect every configured server, one at a time, through the stack runner
 * - callTool(): route a qualified tool name to its session
 * - cleanup(): tear everything down; always appears to succeed
 *
 * Partial bring-up is fine. Only a load where no server connects is fatal.
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/logger.js';
import {
    FatalLoadError,
    ServerUnavailable,
    ToolInvocationError,
    ToolNotFound,
    errorMessage,
    type LoadFailure
} from '../types/errors.js';
import type { ServerDescriptor } from '../types/config.js';
import { loadServerDescriptors } from './server-config.js';
import { StackRunner, type StackRunnerOptions } from './stack-runner.js';
import { toFunctionDefinition, type FunctionToolDefinition, type ToolDescriptor } from './tool-catalog.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 600_000;

/**
 * Any extra client the manager should close on cleanup (an HTTP client to a model server, say)
 */
export interface AuxiliaryClient {
    close(): Promise<void> | void
}

export interface SessionManagerOptions extends StackRunnerOptions {
    /** Timeout for each tool call (default 600000) */
    requestTimeoutMs?: number
    auxiliaryClient?:  AuxiliaryClient
}

export interface LoadReport {
    total:     number
    connected: string[]
    failed:    LoadFailure[]
}

export class SessionManager {
    private readonly runner: StackRunner;
    private readonly requestTimeoutMs: number;
    private readonly auxiliaryClient: AuxiliaryClient | undefined;

    private toolsByName: ReadonlyMap<string, ToolDescriptor> = new Map();
    private tools: readonly ToolDescriptor[] = [];
    private loaded = false;
    private cleanupPromise: Promise<void> | undefined;

    constructor(options: SessionManagerOptions = {}) {
        this.runner = new StackRunner(options);
        this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
        this.auxiliaryClient = options.auxiliaryClient;
    }

    get isLoaded(): boolean {
        return this.loaded;
    }

    /**
     * Load descriptors from a config file and connect them
     *
     * @throws ConfigError if the file is missing or malformed
     * @throws FatalLoadError if no server connects
     */
    async loadServers(configPath: string): Promise<LoadReport> {
        const descriptors = await loadServerDescriptors(configPath);
        return this.loadDescriptors(descriptors);
    }

    /**
     * Connect each descriptor in order, waiting for one to finish before
     * queueing the next. Failed servers are logged and left out of the catalog.
     *
     * @throws FatalLoadError if no server connects
     */
    async loadDescriptors(descriptors: readonly ServerDescriptor[]): Promise<LoadReport> {
        await this.runner.start();

        const report: LoadReport = { total: descriptors.length, connected: [], failed: [] };

        for(const descriptor of descriptors) {
            const outcome = await this.runner.connect(descriptor);
            if(outcome.ok) {
                report.connected.push(outcome.serverName);
                this.publishSnapshot();
                logger.info({ serverName: outcome.serverName, toolCount: outcome.tools.length }, 'Server connected');
            } else {
                report.failed.push({ serverName: outcome.serverName, error: outcome.error.message });
                logger.error({ serverName: outcome.serverName, error: outcome.error.message }, 'Failed to connect to server');
            }
        }

        logger.info(
            { connectedCount: report.connected.length, totalServers: report.total, failures: report.failed },
            `Connected to ${report.connected.length}/${report.total} MCP servers`
        );

        if(report.connected.length === 0) {
            throw new FatalLoadError(report.failed);
        }

        this.loaded = this.cleanupPromise === undefined;
        return report;
    }

    /**
     * Call a tool by qualified name and return its primary text payload
     *
     * @throws ToolNotFound if the name is not in the catalog (no I/O is attempted)
     * @throws ServerUnavailable if the owning session has gone away
     * @throws ToolInvocationError on transport or protocol failure
     */
    async callTool(qualifiedName: string, args: Record<string, unknown> = {}): Promise<string> {
        const tool = this.toolsByName.get(qualifiedName);
        if(!tool) {
            throw new ToolNotFound(qualifiedName);
        }

        const session = this.runner.getSession(tool.serverName);
        if(!session?.initialized) {
            throw new ServerUnavailable(qualifiedName, tool.serverName);
        }

        const startTime = Date.now();
        logger.info({ serverName: tool.serverName, toolName: tool.originalName }, 'Calling tool');

        try {
            const text = await session.callTool(tool.originalName, args, this.requestTimeoutMs);
            logger.info({ serverName: tool.serverName, toolName: tool.originalName, durationMs: Date.now() - startTime }, 'Tool call completed');
            return text;
        } catch (error) {
            logger.error(
                { serverName: tool.serverName, toolName: tool.originalName, durationMs: Date.now() - startTime, error: errorMessage(error) },
                'Tool call failed'
            );
            throw new ToolInvocationError(qualifiedName, error);
        }
    }

    listTools(): readonly ToolDescriptor[] {
        return this.tools;
    }

    getToolDefinitions(): FunctionToolDefinition[] {
        return _.map(this.tools, toFunctionDefinition);
    }

    /**
     * Close everything. Idempotent, never throws.
     */
    cleanup(): Promise<void> {
        this.cleanupPromise ??= this.runCleanup();
        return this.cleanupPromise;
    }

    private async runCleanup(): Promise<void> {
        logger.info('Starting cleanup');

        if(this.auxiliaryClient) {
            try {
                await this.auxiliaryClient.close();
                logger.debug('Auxiliary client closed');
            } catch (error) {
                logger.warn({ error: errorMessage(error) }, 'Error closing auxiliary client');
            }
        }

        // Callers arriving from now on fail fast instead of reaching a half-closed session
        this.loaded = false;
        this.toolsByName = new Map();
        this.tools = [];

        try {
            await this.runner.shutdown();
        } catch (error) {
            logger.error({ error: errorMessage(error) }, 'Unexpected error during cleanup');
        }

        logger.info('Cleanup completed');
    }

    private publishSnapshot(): void {
        if(this.cleanupPromise) {
            return;
        }
        const tools = this.runner.snapshot();
        this.tools = tools;
        this.toolsByName = new Map(_.map(tools, tool => [tool.qualifiedName, tool] as const));
    }
}

export default SessionManager;
