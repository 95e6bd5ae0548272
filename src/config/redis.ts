import Redis from 'ioredis';
import { logger } from '../utils/logger';

export function createRedisClient(url: string): Redis {
    const client = new Redis(url, {
        retryStrategy: (times) => Math.min(times * 100, 3_000),
        maxRetriesPerRequest: 3,
        lazyConnect: false,
    });

    client.on('connect', () => logger.success('Redis', `Connected to ${url.replace(/:\/\/.*@/, '://***@')}`));
    client.on('ready', () => logger.success('Redis', 'Ready to accept commands'));
    client.on('error', (err: Error) => logger.error('Redis', `Error: ${err.message}`));
    client.on('close', () => logger.info('Redis', 'Connection closed'));

    return client;
}
