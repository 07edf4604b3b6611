/**
 * Timeout Utilities
 *
 * Timeouts and delays whose timer handles are always cleared, so a
 * finished operation never keeps the event loop alive.
 */

/**
 * Race a promise against a timeout. The timer is cleared whichever side settles first.
 *
 * @throws Error with timeoutMessage if the timeout fires first
 *
 * @example
 * await withTimeout(session.close(), 5000, 'Session close timed out after 5000ms');
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    timeoutMessage: string
): Promise<T> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
            reject(new Error(timeoutMessage));
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
    }
}

/**
 * Delay that can be cut short. cancel() resolves the promise immediately.
 *
 * @example
 * const { promise, cancel } = cancellableDelay(100);
 * child.once('exit', cancel);
 * await promise;
 */
export function cancellableDelay(delayMs: number): {
    promise: Promise<void>
    cancel:  () => void
} {
    let timeoutHandle: NodeJS.Timeout | undefined;
    let resolveFn: (() => void) | undefined;

    const promise = new Promise<void>((resolve) => {
        resolveFn = resolve;
        timeoutHandle = setTimeout(resolve, delayMs);
    });

    const cancel = (): void => {
        if(timeoutHandle !== undefined) {
            clearTimeout(timeoutHandle);
        }
        resolveFn?.();
    };

    return { promise, cancel };
}
