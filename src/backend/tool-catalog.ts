/**
 * Tool Catalog
 *
 * Maps globally unique qualified names ("{server}.{tool}") to the tool
 * advertised by one connected server. Mutated only by the stack runner;
 * everyone else reads frozen snapshots.
 */

import _ from 'lodash';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export interface ToolDescriptor {
    readonly qualifiedName: string
    readonly originalName:  string
    readonly serverName:    string
    readonly description:   string
    /** JSON schema of the tool arguments, passed through untouched */
    readonly inputSchema:   Readonly<Record<string, unknown>>
}

/**
 * Function-calling shape used by chat-completion style model APIs
 */
export interface FunctionToolDefinition {
    type:     'function'
    function: {
        name:        string
        description: string
        parameters:  Readonly<Record<string, unknown>>
    }
}

export function qualifiedToolName(serverName: string, toolName: string): string {
    return `${serverName}.${toolName}`;
}

export function toToolDescriptor(serverName: string, tool: Tool): ToolDescriptor {
    return Object.freeze({
        qualifiedName: qualifiedToolName(serverName, tool.name),
        originalName:  tool.name,
        serverName,
        description:   tool.description ?? '',
        inputSchema:   { ...tool.inputSchema },
    });
}

export function toFunctionDefinition(tool: ToolDescriptor): FunctionToolDefinition {
    return {
        type:     'function',
        function: {
            name:        tool.qualifiedName,
            description: tool.description,
            parameters:  tool.inputSchema,
        },
    };
}

export class ToolCatalog {
    private readonly tools = new Map<string, ToolDescriptor>();

    get size(): number {
        return this.tools.size;
    }

    /**
     * Register a server's tools. Returns the descriptors actually added;
     * a qualified name that is already taken is skipped.
     */
    register(tools: readonly ToolDescriptor[]): ToolDescriptor[] {
        const added: ToolDescriptor[] = [];
        for(const tool of tools) {
            if(this.tools.has(tool.qualifiedName)) {
                continue;
            }
            this.tools.set(tool.qualifiedName, tool);
            added.push(tool);
        }
        return added;
    }

    get(qualifiedName: string): ToolDescriptor | undefined {
        return this.tools.get(qualifiedName);
    }

    /** Remove every tool owned by a server, returning how many went */
    removeServer(serverName: string): number {
        const owned = _.filter(Array.from(this.tools.values()), { serverName });
        for(const tool of owned) {
            this.tools.delete(tool.qualifiedName);
        }
        return owned.length;
    }

    clear(): void {
        this.tools.clear();
    }

    snapshot(): readonly ToolDescriptor[] {
        return Object.freeze(Array.from(this.tools.values()));
    }
}
