/**
 * Redis client for the session-scoped CSRF values.
 *
 * The connection opens on the first command, so importing this module costs
 * nothing while the memory driver is in use.
 */

import Redis from 'ioredis';

const REDIS_URL = process.env.REDIS_URL || 'redis://localhost:6379';
const RECONNECT_ON = ['READONLY', 'ECONNRESET', 'ECONNREFUSED'];

const redis = new Redis(REDIS_URL, {
    lazyConnect: true,
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
        const delay = Math.min(times * 50, 2000);
        console.log(`[REDIS] Reconnecting in ${delay}ms (attempt ${times})`);
        return delay;
    },
    reconnectOnError: (err) => RECONNECT_ON.some((code) => err.message.includes(code)),
});

redis
    .on('connect', () => console.log('[REDIS] Connected'))
    .on('error', (err) => console.error('[REDIS] Connection error:', err.message))
    .on('close', () => console.log('[REDIS] Connection closed'));

export const KEYS = {
    sessionValue: (sessionId: string, key: string) => `session:${sessionId}:${key}`,
};

export async function setWithTTL(key: string, value: string, ttlSeconds: number): Promise<void> {
    await redis.setex(key, ttlSeconds, value);
}

/**
 * `SET key value EX ttl NX`; true when this call stored the value
 */
export async function setIfAbsentWithTTL(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    return (await redis.set(key, value, 'EX', ttlSeconds, 'NX')) === 'OK';
}

export function getString(key: string): Promise<string | null> {
    return redis.get(key);
}

export async function del(key: string): Promise<void> {
    await redis.del(key);
}

/**
 * Quit if a connection was ever opened
 */
export async function closeRedis(): Promise<void> {
    if (redis.status === 'wait' || redis.status === 'end') return;
    console.log('[REDIS] Closing connection...');
    await redis.quit();
}

export { redis };
export default redis;
