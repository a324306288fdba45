import { CsrfGuard } from './csrfGuard';
import { CookieEncrypter } from './cookieEncrypter';
import { TokenGenerator } from './tokenGenerator';
import { RandomSourceExhaustedError } from './errors';
import { buildTestConfig } from './testConfig.fixture';
import { MemorySessionStore } from '../utils/memorySessionStore';
import { CsrfConfigInput } from '../config/csrf';
import { CsrfRequest } from '../types/csrf';

const SESSION = 'session-1';

function request(method: string, path: string, extra: Partial<CsrfRequest> = {}): CsrfRequest {
  return { method, path, headers: {}, ...extra };
}

function buildGuard(overrides: Partial<CsrfConfigInput> = {}) {
  const config = buildTestConfig({ except: ['stripe/*', 'https://hooks.example.com/*'], ...overrides });
  const store = new MemorySessionStore();
  return { guard: CsrfGuard.create(config, store), config, store };
}

describe('CsrfGuard', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('safe methods', () => {
    it.each(['GET', 'HEAD', 'OPTIONS', 'get'])('should allow %s without a token', async (method) => {
      const { guard } = buildGuard();

      const context = await guard.evaluate(request(method, '/api/orders'), SESSION);

      expect(context.decision).toEqual({ outcome: 'allowed', via: 'safe_method' });
      expect(context.states).toEqual(['INIT', 'METHOD_CHECK', 'ALLOWED']);
    });

    it('should allow a safe method even with a wrong token', async () => {
      const { guard } = buildGuard();
      await guard.currentToken(SESSION);

      const context = await guard.evaluate(
        request('GET', '/api/orders', { headers: { 'x-csrf-token': 'wrong' } }),
        SESSION
      );

      expect(context.decision.outcome).toBe('allowed');
    });
  });

  describe('exclusions', () => {
    it.each(['/stripe/webhook', '/stripe/'])('should allow excluded path %s without a token', async (path) => {
      const { guard } = buildGuard();

      const context = await guard.evaluate(request('POST', path), SESSION);

      expect(context.decision).toEqual({ outcome: 'allowed', via: 'excluded' });
      expect(context.states).toEqual(['INIT', 'METHOD_CHECK', 'EXCLUSION_CHECK', 'ALLOWED']);
    });

    it('should not exclude a path that only shares the prefix text', async () => {
      const { guard } = buildGuard();

      const context = await guard.evaluate(request('POST', '/stripex/webhook'), SESSION);

      expect(context.decision).toEqual({ outcome: 'rejected', reason: 'TokenMissing' });
    });

    it('should exclude by full uri', async () => {
      const { guard } = buildGuard();

      const context = await guard.evaluate(
        request('DELETE', '/inbound', { uri: 'https://hooks.example.com/inbound?sig=1' }),
        SESSION
      );

      expect(context.decision).toEqual({ outcome: 'allowed', via: 'excluded' });
      expect(context.uri).toBe('https://hooks.example.com/inbound');
    });

    it('should not exclude the same path on another host', async () => {
      const { guard } = buildGuard();

      const context = await guard.evaluate(
        request('DELETE', '/inbound', { uri: 'https://app.example.com/inbound' }),
        SESSION
      );

      expect(context.decision.outcome).toBe('rejected');
    });
  });

  describe('token validation', () => {
    it('should allow a matching _token field', async () => {
      const { guard } = buildGuard();
      const token = await guard.currentToken(SESSION);

      const context = await guard.evaluate(request('POST', '/api/orders', { body: { _token: token } }), SESSION);

      expect(context.decision).toEqual({ outcome: 'allowed', via: 'token' });
      expect(context.states).toEqual(['INIT', 'METHOD_CHECK', 'EXCLUSION_CHECK', 'TOKEN_VALIDATION', 'ALLOWED']);
      expect(context.sessionToken).toBe(token);
    });

    it('should reject a different _token as a mismatch', async () => {
      const { guard } = buildGuard();
      await guard.currentToken(SESSION);

      const context = await guard.evaluate(request('PUT', '/api/orders', { body: { _token: 'forged' } }), SESSION);

      expect(context.decision).toEqual({ outcome: 'rejected', reason: 'TokenMismatch', source: 'field' });
      expect(context.states[context.states.length - 1]).toBe('REJECTED');
    });

    it('should allow a matching X-CSRF-TOKEN header', async () => {
      const { guard } = buildGuard();
      const token = await guard.currentToken(SESSION);

      const context = await guard.evaluate(
        request('PATCH', '/api/orders', { headers: { 'x-csrf-token': token } }),
        SESSION
      );

      expect(context.decision).toEqual({ outcome: 'allowed', via: 'token' });
    });

    it('should allow the issued cookie value echoed as X-XSRF-TOKEN', async () => {
      const { guard } = buildGuard();
      const cookie = await guard.issueCookie(SESSION);

      const context = await guard.evaluate(
        request('POST', '/api/orders', { headers: { 'x-xsrf-token': cookie.value } }),
        SESSION
      );

      expect(context.decision).toEqual({ outcome: 'allowed', via: 'token' });
    });

    it('should reject with TokenMissing before any token was generated', async () => {
      const { guard, store } = buildGuard();

      const context = await guard.evaluate(
        request('POST', '/api/orders', { body: { _token: 'anything' } }),
        SESSION
      );

      expect(context.decision).toEqual({ outcome: 'rejected', reason: 'TokenMissing', source: 'field' });
      expect(store.size).toBe(0);
    });

    it('should stop accepting the old token after regeneration', async () => {
      const { guard } = buildGuard();
      const old = await guard.currentToken(SESSION);
      const rotated = await guard.regenerate(SESSION);

      const stale = await guard.evaluate(request('POST', '/api/orders', { body: { _token: old } }), SESSION);
      const fresh = await guard.evaluate(request('POST', '/api/orders', { body: { _token: rotated } }), SESSION);

      expect(stale.decision).toMatchObject({ outcome: 'rejected', reason: 'TokenMismatch' });
      expect(fresh.decision).toEqual({ outcome: 'allowed', via: 'token' });
    });

    it('should reject with TokenMissing after the session was forgotten', async () => {
      const { guard } = buildGuard();
      const token = await guard.currentToken(SESSION);
      await guard.forget(SESSION);

      const context = await guard.evaluate(request('POST', '/api/orders', { body: { _token: token } }), SESSION);

      expect(context.decision).toMatchObject({ outcome: 'rejected', reason: 'TokenMissing' });
    });

    it('should not accept a token from another session', async () => {
      const { guard } = buildGuard();
      const foreign = await guard.currentToken('session-2');
      await guard.currentToken(SESSION);

      const context = await guard.evaluate(request('POST', '/api/orders', { body: { _token: foreign } }), SESSION);

      expect(context.decision).toMatchObject({ outcome: 'rejected', reason: 'TokenMismatch' });
    });
  });

  describe('test mode', () => {
    it.each(['POST', 'DELETE', 'GET'])('should allow %s with no token at all', async (method) => {
      const { guard } = buildGuard({ testing: true });

      const context = await guard.evaluate(request(method, '/api/orders'), SESSION);

      expect(context.decision).toEqual({ outcome: 'allowed', via: 'testing' });
      expect(context.states).toEqual(['INIT', 'ALLOWED']);
    });

    it('should allow a forged token', async () => {
      const { guard } = buildGuard({ testing: true });
      await guard.currentToken(SESSION);

      const context = await guard.evaluate(request('POST', '/api/orders', { body: { _token: 'forged' } }), SESSION);

      expect(context.decision.outcome).toBe('allowed');
    });
  });

  describe('cookie issuing', () => {
    it('should describe a script-readable cookie carrying the encrypted current token', async () => {
      const { guard, config } = buildGuard();
      const token = await guard.currentToken(SESSION);

      const cookie = await guard.issueCookie(SESSION);

      expect(cookie.name).toBe('XSRF-TOKEN');
      expect(cookie.value).not.toBe(token);
      expect(new CookieEncrypter(config.keys).decrypt(cookie.value, 'XSRF-TOKEN')).toBe(token);
      expect(cookie.options).toEqual({
        httpOnly: false,
        secure: false,
        sameSite: 'lax',
        path: '/',
        maxAge: 120 * 60 * 1000,
      });
    });

    it('should follow rotation', async () => {
      const { guard, config } = buildGuard();
      await guard.issueCookie(SESSION);
      const rotated = await guard.regenerate(SESSION);

      const cookie = await guard.issueCookie(SESSION);

      expect(new CookieEncrypter(config.keys).decrypt(cookie.value, 'XSRF-TOKEN')).toBe(rotated);
    });

    it('should carry configured scope', async () => {
      const { guard } = buildGuard({ cookie: { secure: true, sameSite: 'none', domain: 'example.com' } });

      const cookie = await guard.issueCookie(SESSION);

      expect(cookie.options).toMatchObject({ secure: true, sameSite: 'none', domain: 'example.com' });
    });
  });

  describe('fatal errors', () => {
    it('should surface an exhausted random source instead of deciding', async () => {
      const config = buildTestConfig();
      const broken = new TokenGenerator(32, () => {
        throw new Error('no entropy');
      });
      const guard = CsrfGuard.create(config, new MemorySessionStore(), broken);

      await expect(guard.currentToken(SESSION)).rejects.toBeInstanceOf(RandomSourceExhaustedError);
    });
  });
});
