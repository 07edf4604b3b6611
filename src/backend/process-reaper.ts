/**
 * Process Reaper
 *
 * Makes sure a server child is really gone after its session closed:
 * SIGTERM first, SIGKILL once the grace period runs out.
 */

import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/logger.js';
import { cancellableDelay } from '../utils/timeout.js';
import { errorMessage } from '../types/errors.js';

export type SignalSender = (pid: number, signal: NodeJS.Signals | 0) => void;

export type TerminationResult = 'not-running' | 'terminated' | 'killed' | 'failed';

function errorCode(error: unknown): unknown {
    return _.isError(error) && 'code' in error ? error.code : undefined;
}

export class ProcessReaper {
    constructor(
        private readonly sendSignal: SignalSender = (pid, signal) => {
            process.kill(pid, signal);
        },
        private readonly pollIntervalMs = 100
    ) {}

    /**
     * Liveness check with signal 0. EPERM means the process exists but belongs to someone else.
     */
    isAlive(pid: number): boolean {
        try {
            this.sendSignal(pid, 0);
            return true;
        } catch (error) {
            return errorCode(error) === 'EPERM';
        }
    }

    /**
     * Stop a process, escalating to SIGKILL after graceMs. Never throws.
     *
     * hasExited is checked before every signal: once the owner has seen the
     * child exit, the pid may already belong to another process.
     */
    async terminate(pid: number, graceMs: number, hasExited: () => boolean = () => false): Promise<TerminationResult> {
        if(hasExited() || !this.isAlive(pid)) {
            return 'not-running';
        }

        try {
            logger.info({ pid }, 'Sending SIGTERM to server process');
            this.sendSignal(pid, 'SIGTERM');

            const deadline = Date.now() + graceMs;
            while(Date.now() < deadline) {
                const { promise } = cancellableDelay(Math.min(this.pollIntervalMs, deadline - Date.now()));
                await promise;
                if(hasExited() || !this.isAlive(pid)) {
                    return 'terminated';
                }
            }

            if(hasExited()) {
                return 'terminated';
            }

            logger.warn({ pid, graceMs }, 'Server process did not exit gracefully, killing');
            this.sendSignal(pid, 'SIGKILL');
            return 'killed';
        } catch (error) {
            if(errorCode(error) === 'ESRCH') {
                return 'terminated';
            }
            logger.error({ pid, error: errorMessage(error) }, 'Failed to signal server process');
            return 'failed';
        }
    }
}
