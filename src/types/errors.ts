/**
 * Error taxonomy for the session host
 *
 * - ConfigError: descriptor file missing or malformed (fatal at load start)
 * - ConnectError: one server failed to spawn, handshake or list tools (counted, never fatal alone)
 * - FatalLoadError: no server could be connected
 * - ToolNotFound / ServerUnavailable / ToolInvocationError: call-time failures
 * - ShutdownFault: teardown problem, logged and never surfaced
 */

import _ from 'lodash';

export class SessionHostError extends Error {
    readonly code:     string;
    readonly details?: Record<string, unknown>;

    constructor(message: string, code: string, options: { details?: Record<string, unknown>, cause?: unknown } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.code = code;
        this.details = options.details;
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class ConfigError extends SessionHostError {
    readonly configPath: string;

    constructor(configPath: string, message: string, cause?: unknown) {
        super(message, 'CONFIG_ERROR', { details: { configPath }, cause });
        this.configPath = configPath;
    }
}

export class ConnectError extends SessionHostError {
    readonly serverName: string;

    constructor(serverName: string, message: string, cause?: unknown) {
        super(`Failed to connect to server "${serverName}": ${message}`, 'CONNECT_ERROR', { details: { serverName }, cause });
        this.serverName = serverName;
    }
}

export interface LoadFailure {
    serverName: string
    error:      string
}

export class FatalLoadError extends SessionHostError {
    readonly failures: readonly LoadFailure[];

    constructor(failures: readonly LoadFailure[]) {
        const summary = failures.length === 0
            ? 'no servers configured'
            : _.map(failures, f => `${f.serverName}: ${f.error}`).join('; ');
        super(`Failed to connect to any MCP server (${summary})`, 'FATAL_LOAD', { details: { failureCount: failures.length } });
        this.failures = failures;
    }
}

export class ToolNotFound extends SessionHostError {
    readonly toolName: string;

    constructor(toolName: string) {
        super(`Tool "${toolName}" not found`, 'TOOL_NOT_FOUND', { details: { toolName } });
        this.toolName = toolName;
    }
}

export class ServerUnavailable extends SessionHostError {
    readonly toolName:   string;
    readonly serverName: string;

    constructor(toolName: string, serverName: string) {
        super(`Server "${serverName}" for tool "${toolName}" is no longer available`, 'SERVER_UNAVAILABLE', { details: { toolName, serverName } });
        this.toolName = toolName;
        this.serverName = serverName;
    }
}

export class ToolInvocationError extends SessionHostError {
    readonly toolName: string;

    constructor(toolName: string, cause: unknown) {
        super(`Tool call ${toolName} failed: ${errorMessage(cause)}`, 'TOOL_INVOCATION', { details: { toolName }, cause });
        this.toolName = toolName;
    }
}

export class ShutdownFault extends SessionHostError {
    constructor(resource: string, cause: unknown) {
        super(`Failed to release ${resource}: ${errorMessage(cause)}`, 'SHUTDOWN_FAULT', { details: { resource }, cause });
    }
}

/**
 * Message of an unknown thrown value, for log records
 */
export function errorMessage(error: unknown): string {
    return _.isError(error) ? error.message : String(error);
}
