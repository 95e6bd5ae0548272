import { describe, expect, it } from 'vitest';
import { InProcessLockService, withLock } from '../services/lockService';
import { LockBusyError } from '../utils/errors';

describe('InProcessLockService', () => {
    it('grants a key to one holder until it is released or expires', async () => {
        let now = 0;
        const locks = new InProcessLockService(() => now);

        const token = await locks.tryAcquire('unit:1', 10);
        expect(token).not.toBeNull();
        expect(await locks.tryAcquire('unit:1', 10)).toBeNull();

        now = 10_000;
        expect(await locks.tryAcquire('unit:1', 10)).not.toBeNull();
    });

    it('ignores a release with a stale token', async () => {
        const locks = new InProcessLockService();
        const token = await locks.tryAcquire('lead:+972501234567', 10);

        await locks.release('lead:+972501234567', 'someone-else');
        expect(await locks.tryAcquire('lead:+972501234567', 10)).toBeNull();

        if (token) await locks.release('lead:+972501234567', token);
        expect(await locks.tryAcquire('lead:+972501234567', 10)).not.toBeNull();
    });
});

describe('withLock', () => {
    it('serialises work on the same key', async () => {
        const locks = new InProcessLockService();
        const order: string[] = [];
        const options = { ttlSeconds: 5, waitMs: 1_000, retryMs: 5 };

        await Promise.all([
            withLock(locks, 'lead:1', async () => {
                order.push('a:start');
                await new Promise((resolve) => setTimeout(resolve, 20));
                order.push('a:end');
            }, options),
            withLock(locks, 'lead:1', async () => {
                order.push('b');
            }, options),
        ]);

        expect(order).toEqual(['a:start', 'a:end', 'b']);
    });

    it('throws LockBusyError once the wait runs out and releases after failures', async () => {
        const locks = new InProcessLockService();
        await locks.tryAcquire('unit:1', 5);

        await expect(withLock(locks, 'unit:1', async () => 'never', { ttlSeconds: 5, waitMs: 0 })).rejects.toBeInstanceOf(
            LockBusyError
        );

        await expect(
            withLock(locks, 'unit:2', async () => {
                throw new Error('boom');
            }, { ttlSeconds: 5, waitMs: 0 })
        ).rejects.toThrow('boom');
        expect(await locks.tryAcquire('unit:2', 5)).not.toBeNull();
    });
});
