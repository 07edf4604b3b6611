/**
 * Session host backend
 *
 * This module is responsible for:
 * - Reading server descriptors
 * - Launching MCP servers as stdio subprocesses and owning their sessions
 * - Aggregating their tools into one namespaced catalog
 * - Routing tool calls to the owning session
 */

export { SessionManager } from './session-manager.js';
export type { AuxiliaryClient, LoadReport, SessionManagerOptions } from './session-manager.js';
export { StackRunner } from './stack-runner.js';
export type { ConnectOutcome, PendingAction, RunnerState, StackRunnerOptions } from './stack-runner.js';
export { SessionHandle, connectSession, createStdioTransport } from './session.js';
export type { ClientInfo, ConnectSessionOptions, ConnectedSession, SessionTransport, TransportFactory } from './session.js';
export { ToolCatalog, qualifiedToolName, toFunctionDefinition } from './tool-catalog.js';
export type { FunctionToolDefinition, ToolDescriptor } from './tool-catalog.js';
export { ProcessReaper } from './process-reaper.js';
export type { SignalSender, TerminationResult } from './process-reaper.js';
export { loadServerDescriptors, substituteEnvVars, toServerDescriptors } from './server-config.js';
