/**
 * Session Token Store - binds exactly one CSRF token to each session
 *
 * Every read goes to the backing SessionStore so concurrent requests for the
 * same session always observe the latest rotation.
 */

import { SessionStore } from '../types/session';
import { TokenGenerator } from './tokenGenerator';
import { SecurityLogger, sessionTag } from '../utils/securityLogger';

export const DEFAULT_TOKEN_KEY = '_csrf_token';

export class SessionTokenStore {
    private readonly store: SessionStore;
    private readonly generator: TokenGenerator;
    private readonly key: string;
    // First-access generations currently in flight, per session
    private readonly pending = new Map<string, Promise<string>>();

    constructor(store: SessionStore, generator: TokenGenerator, key: string = DEFAULT_TOKEN_KEY) {
        this.store = store;
        this.generator = generator;
        this.key = key;
    }

    /**
     * Read the session's token without creating one
     */
    async peekToken(sessionId: string): Promise<string | null> {
        const token = await this.store.get(sessionId, this.key);
        return token ? token : null;
    }

    /**
     * Get the session's token, generating and persisting one on first access
     */
    async currentToken(sessionId: string): Promise<string> {
        const existing = await this.peekToken(sessionId);
        if (existing) return existing;

        const inFlight = this.pending.get(sessionId);
        if (inFlight) return inFlight;

        const creation = this.createToken(sessionId);
        this.pending.set(sessionId, creation);
        try {
            return await creation;
        } finally {
            this.pending.delete(sessionId);
        }
    }

    /**
     * Replace the session's token. The previous token stops validating immediately.
     */
    async regenerate(sessionId: string): Promise<string> {
        const token = this.generator.generate();
        await this.store.set(sessionId, this.key, token);

        SecurityLogger.info('CSRF token rotated', {
            event: 'csrf_token_rotated',
            sessionId: sessionTag(sessionId),
        });

        return token;
    }

    /**
     * Drop the token of a session that has ended
     */
    async forget(sessionId: string): Promise<void> {
        await this.store.delete(sessionId, this.key);
    }

    private async createToken(sessionId: string): Promise<string> {
        const candidate = this.generator.generate();
        return this.store.setIfAbsent(sessionId, this.key, candidate);
    }
}
