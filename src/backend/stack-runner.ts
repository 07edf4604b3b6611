/**
 * Stack Runner
 *
 * The single owner of every session resource. Connect and Shutdown
 * requests from any caller go through one FIFO queue consumed by one
 * long-lived loop, so each child process is acquired and released by
 * the same context. Acquired resources sit on a stack and are released
 * in reverse order on shutdown.
 *
 *   not-started -> running -> draining -> stopped
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/logger.js';
import { AsyncQueue, ResultSlot, Signal } from '../utils/deferred.js';
import { withTimeout } from '../utils/timeout.js';
import { ConnectError, ShutdownFault, errorMessage } from '../types/errors.js';
import type { ServerDescriptor } from '../types/config.js';
import { connectSession, type ConnectSessionOptions, type SessionHandle } from './session.js';
import { ToolCatalog, type ToolDescriptor } from './tool-catalog.js';
import { ProcessReaper } from './process-reaper.js';

export type RunnerState = 'not-started' | 'running' | 'draining' | 'stopped';

export type ConnectOutcome
    = | { ok: true, serverName: string, tools: readonly ToolDescriptor[] }
      | { ok: false, serverName: string, error: ConnectError };

export type PendingAction
    = | { kind: 'connect', descriptor: ServerDescriptor, slot: ResultSlot<ConnectOutcome> }
      | { kind: 'shutdown' };

interface StackedResource {
    name:    string
    release: () => Promise<void>
}

export interface StackRunnerOptions extends ConnectSessionOptions {
    /** Grace period between SIGTERM and SIGKILL, also the bound on a session close (default 5000) */
    killGraceMs?: number
    reaper?:      ProcessReaper
}

export const DEFAULT_KILL_GRACE_MS = 5000;

export class StackRunner {
    private currentState: RunnerState = 'not-started';
    private readonly queue = new AsyncQueue<PendingAction>();
    private readonly resources: StackedResource[] = [];
    private readonly sessions = new Map<string, SessionHandle>();
    private readonly catalog = new ToolCatalog();

    private readonly ready = new Signal();
    private readonly stopped = new Signal();
    private loop: Promise<void> | undefined;
    private shutdownRequested = false;

    private readonly killGraceMs: number;
    private readonly reaper: ProcessReaper;

    constructor(private readonly options: StackRunnerOptions = {}) {
        this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
        this.reaper = options.reaper ?? new ProcessReaper();
    }

    get state(): RunnerState {
        return this.currentState;
    }

    get resourceCount(): number {
        return this.resources.length;
    }

    /**
     * Start the loop once and wait until it accepts actions. Concurrent
     * callers share the same start; a stopped runner stays stopped.
     */
    async start(): Promise<void> {
        if(this.currentState === 'not-started' && !this.loop) {
            this.loop = this.run();
        }
        if(this.currentState === 'draining' || this.currentState === 'stopped') {
            return;
        }
        await this.ready.wait();
    }

    /**
     * Queue a connect and wait for its outcome. Never rejects.
     */
    async connect(descriptor: ServerDescriptor): Promise<ConnectOutcome> {
        const slot = new ResultSlot<ConnectOutcome>();
        this.enqueue({ kind: 'connect', descriptor, slot });
        return slot.read();
    }

    /**
     * Ask the loop to tear everything down and wait until it has.
     * Safe to call repeatedly, and on a runner that never started.
     */
    async shutdown(): Promise<void> {
        if(!this.loop) {
            this.currentState = 'stopped';
            this.stopped.set();
            return;
        }

        if(!this.shutdownRequested) {
            this.shutdownRequested = true;
            this.queue.push({ kind: 'shutdown' });
        }

        await this.stopped.wait();
        await this.loop;
    }

    getSession(serverName: string): SessionHandle | undefined {
        return this.sessions.get(serverName);
    }

    sessionNames(): string[] {
        return Array.from(this.sessions.keys());
    }

    snapshot(): readonly ToolDescriptor[] {
        return this.catalog.snapshot();
    }

    private enqueue(action: PendingAction): void {
        if(this.currentState === 'draining' || this.currentState === 'stopped' || this.shutdownRequested) {
            this.reject(action);
            return;
        }
        this.queue.push(action);
    }

    private reject(action: PendingAction): void {
        if(action.kind === 'connect') {
            const { name } = action.descriptor;
            action.slot.set({ ok: false, serverName: name, error: new ConnectError(name, 'session runner is stopped') });
        }
    }

    private async run(): Promise<void> {
        this.currentState = 'running';
        this.ready.set();
        logger.debug('Session runner started');

        try {
            for(;;) {
                const action = await this.queue.take();
                if(action.kind === 'shutdown') {
                    break;
                }
                action.slot.set(await this.handleConnect(action.descriptor));
            }
        } finally {
            this.currentState = 'draining';
            try {
                await this.teardown();
            } finally {
                this.currentState = 'stopped';
                this.stopped.set();
                logger.debug('Session runner stopped');
            }
        }
    }

    private async handleConnect(descriptor: ServerDescriptor): Promise<ConnectOutcome> {
        const serverName = descriptor.name;

        if(this.sessions.has(serverName)) {
            return { ok: false, serverName, error: new ConnectError(serverName, 'a session with this name is already connected') };
        }

        try {
            const { handle, tools } = await connectSession(descriptor, this.options);

            this.resources.push({
                name:    `session "${serverName}"`,
                release: () => this.releaseSession(handle),
            });
            this.sessions.set(serverName, handle);

            const registered = this.catalog.register(tools);
            if(registered.length < tools.length) {
                logger.warn(
                    { serverName, skipped: _.map(_.difference(tools, registered), 'qualifiedName') },
                    'Skipped tools with duplicate qualified names'
                );
            }

            return { ok: true, serverName, tools: registered };
        } catch (error) {
            const connectError = error instanceof ConnectError ? error : new ConnectError(serverName, errorMessage(error), error);
            return { ok: false, serverName, error: connectError };
        }
    }

    private async releaseSession(handle: SessionHandle): Promise<void> {
        const { serverName } = handle;
        const pid = handle.pid;

        this.sessions.delete(serverName);
        this.catalog.removeServer(serverName);

        try {
            await withTimeout(handle.close(), this.killGraceMs, `Closing session "${serverName}" timed out after ${this.killGraceMs}ms`);
        } finally {
            if(pid !== null && !handle.exited) {
                await this.reaper.terminate(pid, this.killGraceMs, () => handle.exited);
            }
        }
        logger.info({ serverName, pid }, 'Session closed');
    }

    /**
     * Release resources newest first. Faults are logged, never raised.
     */
    private async teardown(): Promise<void> {
        logger.info({ resourceCount: this.resources.length }, 'Releasing session resources');

        for(let resource = this.resources.pop(); resource; resource = this.resources.pop()) {
            try {
                await resource.release();
            } catch (error) {
                const fault = new ShutdownFault(resource.name, error);
                logger.error({ resource: resource.name, error: fault.message }, 'Shutdown fault');
            }
        }

        this.sessions.clear();
        this.catalog.clear();

        for(const action of this.queue.drain()) {
            this.reject(action);
        }
    }
}
