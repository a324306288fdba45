/**
 * CSRF Guard - per-request verification state machine
 *
 *   INIT -> METHOD_CHECK -> EXCLUSION_CHECK -> TOKEN_VALIDATION -> ALLOWED | REJECTED
 *
 * Safe methods and excluded paths short-circuit to ALLOWED. Test mode skips
 * straight from INIT to ALLOWED. Validation failures come back as a decision
 * value; only environment failures (random source, session store) reject.
 */

import { CsrfConfig } from '../config/csrf';
import { CookieInstruction, CsrfDecision, CsrfRequest, CsrfState, ValidationContext } from '../types/csrf';
import { SessionStore } from '../types/session';
import { CookieEncrypter } from './cookieEncrypter';
import { CookieIssuer } from './cookieIssuer';
import { isExcluded, normalizePath, normalizeUri } from './patternMatcher';
import { RequestValidator } from './requestValidator';
import { SessionTokenStore } from './sessionTokenStore';
import { TokenGenerator } from './tokenGenerator';

const STATE_CHANGING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

type PendingContext = Omit<ValidationContext, 'decision'>;

export interface CsrfGuardDependencies {
    config: CsrfConfig;
    tokens: SessionTokenStore;
    validator: RequestValidator;
    cookies: CookieIssuer;
}

export class CsrfGuard {
    readonly config: CsrfConfig;
    private readonly tokens: SessionTokenStore;
    private readonly validator: RequestValidator;
    private readonly cookies: CookieIssuer;

    constructor(deps: CsrfGuardDependencies) {
        this.config = deps.config;
        this.tokens = deps.tokens;
        this.validator = deps.validator;
        this.cookies = deps.cookies;
    }

    /**
     * Wire the default collaborators around a session store
     */
    static create(config: CsrfConfig, store: SessionStore, generator?: TokenGenerator): CsrfGuard {
        const encrypter = new CookieEncrypter(config.keys);
        const tokens = new SessionTokenStore(store, generator ?? new TokenGenerator(config.tokenBytes));

        return new CsrfGuard({
            config,
            tokens,
            validator: new RequestValidator(config, encrypter),
            cookies: new CookieIssuer(config, encrypter, tokens),
        });
    }

    async evaluate(request: CsrfRequest, sessionId: string): Promise<ValidationContext> {
        const method = request.method.toUpperCase();
        const context: PendingContext = {
            method,
            path: normalizePath(request.path),
            uri: request.uri ? normalizeUri(request.uri) : null,
            states: ['INIT'],
            candidate: null,
            sessionToken: null,
        };

        if (this.config.testing) {
            return this.finish(context, { outcome: 'allowed', via: 'testing' });
        }

        this.enter(context, 'METHOD_CHECK');
        if (!STATE_CHANGING_METHODS.has(method)) {
            return this.finish(context, { outcome: 'allowed', via: 'safe_method' });
        }

        this.enter(context, 'EXCLUSION_CHECK');
        if (isExcluded({ path: context.path, uri: context.uri }, this.config.except)) {
            return this.finish(context, { outcome: 'allowed', via: 'excluded' });
        }

        this.enter(context, 'TOKEN_VALIDATION');
        context.sessionToken = await this.tokens.peekToken(sessionId);
        const result = this.validator.validate(request, context.sessionToken);
        context.candidate = result.candidate;

        return this.finish(context, result.decision);
    }

    /**
     * Token for embedding in forms or meta tags; created on first use
     */
    currentToken(sessionId: string): Promise<string> {
        return this.tokens.currentToken(sessionId);
    }

    /**
     * Call whenever the session itself is regenerated (login, logout)
     */
    regenerate(sessionId: string): Promise<string> {
        return this.tokens.regenerate(sessionId);
    }

    forget(sessionId: string): Promise<void> {
        return this.tokens.forget(sessionId);
    }

    issueCookie(sessionId: string): Promise<CookieInstruction> {
        return this.cookies.issue(sessionId);
    }

    cookieFor(token: string): CookieInstruction {
        return this.cookies.forToken(token);
    }

    private enter(context: PendingContext, state: CsrfState): void {
        context.states.push(state);
    }

    private finish(context: PendingContext, decision: CsrfDecision): ValidationContext {
        this.enter(context, decision.outcome === 'allowed' ? 'ALLOWED' : 'REJECTED');
        return { ...context, decision };
    }
}
