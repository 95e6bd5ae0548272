import { randomUUID } from 'crypto';
import type Redis from 'ioredis';
import { LockBusyError } from '../utils/errors';
import { logger } from '../utils/logger';
import { sleep } from '../utils/time';

export interface LockService {
    /** Returns an ownership token, or null when someone else holds the key. */
    tryAcquire(key: string, ttlSeconds: number): Promise<string | null>;
    release(key: string, token: string): Promise<void>;
}

export interface LockOptions {
    ttlSeconds: number;
    /** How long to keep retrying before giving up; 0 means a single attempt. */
    waitMs: number;
    retryMs?: number;
}

function lockKey(key: string): string {
    return `lock:${key}`;
}

// only the owner may delete; an expired lock re-taken by another caller stays put
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
end
return 0`;

export class RedisLockService implements LockService {
    constructor(private readonly redis: Redis) {}

    async tryAcquire(key: string, ttlSeconds: number): Promise<string | null> {
        const token = randomUUID();
        const result = await this.redis.set(lockKey(key), token, 'EX', ttlSeconds, 'NX');
        return result === 'OK' ? token : null;
    }

    async release(key: string, token: string): Promise<void> {
        await this.redis.eval(RELEASE_SCRIPT, 1, lockKey(key), token);
    }
}

export class InProcessLockService implements LockService {
    private held = new Map<string, { token: string; expiresAt: number }>();

    constructor(private readonly clock: () => number = Date.now) {}

    async tryAcquire(key: string, ttlSeconds: number): Promise<string | null> {
        const now = this.clock();
        const current = this.held.get(key);
        if (current && current.expiresAt > now) return null;

        const token = randomUUID();
        this.held.set(key, { token, expiresAt: now + ttlSeconds * 1000 });
        return token;
    }

    async release(key: string, token: string): Promise<void> {
        if (this.held.get(key)?.token === token) this.held.delete(key);
    }
}

export async function withLock<T>(
    locks: LockService,
    key: string,
    fn: () => Promise<T>,
    options: LockOptions
): Promise<T> {
    const retryMs = options.retryMs ?? 50;
    const deadline = Date.now() + options.waitMs;

    let token = await locks.tryAcquire(key, options.ttlSeconds);
    while (token === null && Date.now() < deadline) {
        await sleep(retryMs);
        token = await locks.tryAcquire(key, options.ttlSeconds);
    }

    if (token === null) {
        logger.warn('Lock', `Lock FAILED  — ${key} is already held`);
        throw new LockBusyError(key);
    }
    logger.debug('Lock', `Lock acquired — ${key}`);

    try {
        return await fn();
    } finally {
        await locks.release(key, token);
        logger.debug('Lock', `Lock released — ${key}`);
    }
}
