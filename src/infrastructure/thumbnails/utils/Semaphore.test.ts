/**
 * Unit tests for Semaphore
 */

import { describe, it, expect } from 'vitest';
import { Semaphore } from './Semaphore';

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((res) => {
        resolve = res;
    });
    return { promise, resolve };
}

describe('Semaphore', () => {
    it('should reject a non-positive capacity', () => {
        expect(() => new Semaphore(0)).toThrow('capacity must be a positive integer');
    });

    it('should grant slots up to capacity and queue the rest', async () => {
        const semaphore = new Semaphore(2);

        await semaphore.acquire();
        await semaphore.acquire();
        let thirdGranted = false;
        const third = semaphore.acquire().then(() => {
            thirdGranted = true;
        });

        await Promise.resolve();
        expect(semaphore.inUse).toBe(2);
        expect(semaphore.queued).toBe(1);
        expect(thirdGranted).toBe(false);

        semaphore.release();
        await third;
        expect(thirdGranted).toBe(true);
        expect(semaphore.inUse).toBe(2);
        expect(semaphore.queued).toBe(0);
    });

    it('should wake waiters in arrival order', async () => {
        const semaphore = new Semaphore(1);
        const order: string[] = [];

        await semaphore.acquire();
        const a = semaphore.acquire().then(() => order.push('a'));
        const b = semaphore.acquire().then(() => order.push('b'));

        semaphore.release();
        await a;
        semaphore.release();
        await b;

        expect(order).toEqual(['a', 'b']);
    });

    it('should never run more tasks than its capacity', async () => {
        const semaphore = new Semaphore(2);
        const gates = Array.from({ length: 5 }, () => deferred());
        let running = 0;
        let peak = 0;

        const tasks = gates.map((gate) =>
            semaphore.use(async () => {
                running += 1;
                peak = Math.max(peak, running);
                await gate.promise;
                running -= 1;
            })
        );

        for (const gate of gates) {
            await new Promise((resolve) => setImmediate(resolve));
            gate.resolve();
        }
        await Promise.all(tasks);

        expect(peak).toBe(2);
        expect(semaphore.inUse).toBe(0);
    });

    it('should release the slot when a task throws', async () => {
        const semaphore = new Semaphore(1);

        await expect(semaphore.use(async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        expect(semaphore.inUse).toBe(0);
    });

    it('should refuse an unmatched release', () => {
        const semaphore = new Semaphore(1);
        expect(() => semaphore.release()).toThrow('release() called more times than acquire()');
    });
});
