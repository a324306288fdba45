/**
 * Redis-backed SessionStore
 *
 * Each value lives under `session:<id>:<key>` with a TTL equal to the session lifetime.
 */

import { setWithTTL, setIfAbsentWithTTL, getString, del, KEYS } from '../config/redis';
import { SessionStore } from '../types/session';

export class RedisSessionStore implements SessionStore {
    private readonly ttlSeconds: number;

    constructor(ttlSeconds: number) {
        this.ttlSeconds = ttlSeconds;
    }

    async get(sessionId: string, key: string): Promise<string | null> {
        return await getString(KEYS.sessionValue(sessionId, key));
    }

    async set(sessionId: string, key: string, value: string): Promise<void> {
        await setWithTTL(KEYS.sessionValue(sessionId, key), value, this.ttlSeconds);
    }

    async setIfAbsent(sessionId: string, key: string, value: string): Promise<string> {
        const redisKey = KEYS.sessionValue(sessionId, key);
        if (await setIfAbsentWithTTL(redisKey, value, this.ttlSeconds)) {
            return value;
        }

        const winner = await getString(redisKey);
        if (winner) return winner;

        // The winning value expired or was deleted between the two commands
        await setWithTTL(redisKey, value, this.ttlSeconds);
        return value;
    }

    async delete(sessionId: string, key: string): Promise<void> {
        await del(KEYS.sessionValue(sessionId, key));
    }
}
