/**
 * MCP Session establishment
 *
 * One session = one child server process + its MCP client:
 * - Spawns the server through a stdio transport (or an injected one)
 * - Runs the initialize handshake under a timeout
 * - Lists the server's tools and qualifies their names
 * - Releases whatever it acquired when any step fails
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/logger.js';
import { ConnectError, errorMessage } from '../types/errors.js';
import type { ServerDescriptor } from '../types/config.js';
import { toToolDescriptor, type ToolDescriptor } from './tool-catalog.js';

export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 600_000;

export interface ClientInfo {
    name:    string
    version: string
}

export const DEFAULT_CLIENT_INFO: ClientInfo = {
    name:    'mcp-session-host',
    version: '0.1.0',
};

/**
 * A transport plus a way to read the child's pid once it has started
 */
export interface SessionTransport {
    transport: Transport
    pid():     number | null
}

export type TransportFactory = (descriptor: ServerDescriptor) => SessionTransport | Promise<SessionTransport>;

/**
 * Default factory: spawn the descriptor's command over stdio. The child
 * gets the SDK's safe default environment plus the descriptor's env, and
 * its stderr is forwarded to the debug log.
 */
export function createStdioTransport(descriptor: ServerDescriptor): SessionTransport {
    const transport = new StdioClientTransport({
        command: descriptor.command,
        args:    [...descriptor.args],
        env:     {
            ...getDefaultEnvironment(),
            ...descriptor.env,
        },
        cwd:    descriptor.cwd,
        stderr: 'pipe',
    });

    transport.stderr?.on('data', (data: Buffer) => {
        for(const line of _.split(_.trim(data.toString()), '\n')) {
            const trimmedLine = _.trim(line);
            if(trimmedLine) {
                logger.debug({ serverName: descriptor.name }, trimmedLine);
            }
        }
    });

    return { transport, pid: () => transport.pid };
}

/**
 * Live, initialized connection to one server. Owned by the stack runner;
 * other code reaches it by server name only.
 */
export class SessionHandle {
    private open = true;
    private transportClosed = false;

    constructor(
        readonly serverName: string,
        private readonly client: Client,
        private readonly sessionTransport: SessionTransport
    ) {
        client.onclose = () => {
            if(this.open) {
                logger.warn({ serverName }, 'Server connection closed');
            }
            this.open = false;
            this.transportClosed = true;
        };
        client.onerror = (error: Error) => {
            logger.warn({ serverName, error: error.message }, 'Server connection error');
        };
    }

    get pid(): number | null {
        return this.sessionTransport.pid();
    }

    /** False once the transport has closed, whether by teardown or by the server exiting */
    get initialized(): boolean {
        return this.open;
    }

    /** True once the transport itself reported close; for stdio, the child has exited */
    get exited(): boolean {
        return this.transportClosed;
    }

    /**
     * Invoke a tool by its original name and return the primary text payload:
     * the first content entry's text, the JSON of a non-text first entry, or
     * "" when the result has no content.
     */
    async callTool(toolName: string, args: Record<string, unknown>, timeoutMs: number): Promise<string> {
        const raw: unknown = await this.client.callTool({ name: toolName, arguments: args }, undefined, { timeout: timeoutMs });
        const parsed = CallToolResultSchema.safeParse(raw);
        if(!parsed.success) {
            throw new Error(`Malformed tool result from server "${this.serverName}"`);
        }

        if(parsed.data.isError) {
            logger.warn({ serverName: this.serverName, toolName }, 'Tool reported an error result');
        }

        const first = _.head(parsed.data.content);
        if(first === undefined) {
            return '';
        }
        return first.type === 'text' ? first.text : JSON.stringify(first);
    }

    async close(): Promise<void> {
        this.open = false;
        await this.client.close();
    }
}

export interface ConnectSessionOptions {
    createTransport?:    TransportFactory
    handshakeTimeoutMs?: number
    clientInfo?:         ClientInfo
}

export interface ConnectedSession {
    handle: SessionHandle
    tools:  ToolDescriptor[]
}

async function listAllTools(client: Client, timeoutMs: number): Promise<Tool[]> {
    const tools: Tool[] = [];
    let cursor: string | undefined;
    do {
        const page = await client.listTools(cursor === undefined ? undefined : { cursor }, { timeout: timeoutMs });
        tools.push(...page.tools);
        cursor = page.nextCursor;
    } while(cursor !== undefined);
    return tools;
}

/**
 * Spawn, handshake and list tools for one server
 *
 * @throws ConnectError on spawn failure, handshake timeout or tool-list failure
 */
export async function connectSession(descriptor: ServerDescriptor, options: ConnectSessionOptions = {}): Promise<ConnectedSession> {
    const {
        createTransport = createStdioTransport,
        handshakeTimeoutMs = DEFAULT_HANDSHAKE_TIMEOUT_MS,
        clientInfo = DEFAULT_CLIENT_INFO,
    } = options;

    logger.info({ serverName: descriptor.name, command: descriptor.command, args: descriptor.args, cwd: descriptor.cwd }, 'Connecting to server');

    let sessionTransport: SessionTransport;
    try {
        sessionTransport = await createTransport(descriptor);
    } catch (error) {
        throw new ConnectError(descriptor.name, errorMessage(error), error);
    }

    const client = new Client(clientInfo, { capabilities: {} });

    try {
        await client.connect(sessionTransport.transport, { timeout: handshakeTimeoutMs });
        const handle = new SessionHandle(descriptor.name, client, sessionTransport);
        const tools = await listAllTools(client, handshakeTimeoutMs);

        logger.info(
            {
                serverName: descriptor.name,
                pid:        handle.pid,
                server:     client.getServerVersion(),
                toolCount:  tools.length,
            },
            'Connected to server'
        );

        return {
            handle,
            tools: _.map(tools, tool => toToolDescriptor(descriptor.name, tool)),
        };
    } catch (error) {
        try {
            await client.close();
        } catch (closeError) {
            logger.warn({ serverName: descriptor.name, error: errorMessage(closeError) }, 'Error closing failed connection');
        }
        throw new ConnectError(descriptor.name, errorMessage(error), error);
    }
}
