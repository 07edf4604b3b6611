/**
 * Tests for timeout utilities
 */

import { describe, it, expect } from 'vitest';
import { withTimeout, cancellableDelay } from '../../src/utils/timeout.js';

describe('withTimeout', () => {
    it('returns the result when the operation finishes first', async () => {
        await expect(withTimeout(Promise.resolve('success'), 5000, 'Timeout')).resolves.toBe('success');
    });

    it('rejects with the timeout message when the operation is too slow', async () => {
        const operation = new Promise(resolve => setTimeout(resolve, 200));

        await expect(withTimeout(operation, 10, 'Operation timed out')).rejects.toThrow('Operation timed out');
    });

    it('propagates errors from the operation', async () => {
        await expect(withTimeout(Promise.reject(new Error('Operation failed')), 5000, 'Timeout')).rejects.toThrow('Operation failed');
    });

    it('handles many fast operations', async () => {
        const results = await Promise.all(
            Array.from({ length: 50 }, (_unused, i) => withTimeout(Promise.resolve(i), 1000, `Timeout ${i}`))
        );

        expect(results).toHaveLength(50);
        expect(results[49]).toBe(49);
    });
});

describe('cancellableDelay', () => {
    it('resolves after the delay', async () => {
        const startTime = Date.now();
        const { promise } = cancellableDelay(30);

        await promise;

        expect(Date.now() - startTime).toBeGreaterThanOrEqual(25);
    });

    it('resolves immediately when cancelled', async () => {
        const startTime = Date.now();
        const { promise, cancel } = cancellableDelay(5000);

        cancel();
        await promise;

        expect(Date.now() - startTime).toBeLessThan(1000);
    });
});
