import { RequestValidator, safeCompare } from './requestValidator';
import { CookieEncrypter, StaticKeyProvider } from './cookieEncrypter';
import { buildTestConfig, TEST_KEY } from './testConfig.fixture';
import { CsrfRequest } from '../types/csrf';

const SESSION_TOKEN = 'session-token-value';

function post(extra: Partial<CsrfRequest> = {}): CsrfRequest {
  return { method: 'POST', path: '/api/orders', headers: {}, ...extra };
}

describe('RequestValidator', () => {
  const config = buildTestConfig();
  const encrypter = new CookieEncrypter(new StaticKeyProvider(TEST_KEY));
  const validator = new RequestValidator(config, encrypter);

  describe('extractCandidate', () => {
    it('should prefer the body field over both headers', () => {
      const candidate = validator.extractCandidate(post({
        body: { _token: 'from-field' },
        headers: { 'x-csrf-token': 'from-header', 'x-xsrf-token': encrypter.encrypt('from-cookie', 'XSRF-TOKEN') },
      }));

      expect(candidate).toEqual({ source: 'field', value: 'from-field' });
    });

    it('should fall back to X-CSRF-TOKEN when the field is empty', () => {
      const candidate = validator.extractCandidate(post({
        body: { _token: '' },
        headers: { 'x-csrf-token': 'from-header' },
      }));

      expect(candidate).toEqual({ source: 'header', value: 'from-header' });
    });

    it('should look headers up case-insensitively', () => {
      const candidate = validator.extractCandidate(post({ headers: { 'X-Csrf-Token': 'from-header' } }));

      expect(candidate).toEqual({ source: 'header', value: 'from-header' });
    });

    it('should decrypt X-XSRF-TOKEN', () => {
      const candidate = validator.extractCandidate(post({
        headers: { 'x-xsrf-token': encrypter.encrypt('from-cookie', 'XSRF-TOKEN') },
      }));

      expect(candidate).toEqual({ source: 'xsrf-header', value: 'from-cookie' });
    });

    it('should mark an undecryptable X-XSRF-TOKEN as malformed', () => {
      const candidate = validator.extractCandidate(post({ headers: { 'x-xsrf-token': 'garbage' } }));

      expect(candidate).toEqual({ source: 'xsrf-header', value: null });
    });

    it('should mark a non-string field as malformed', () => {
      const candidate = validator.extractCandidate(post({ body: { _token: ['a', 'b'] } }));

      expect(candidate).toEqual({ source: 'field', value: null });
    });

    it('should mark a repeated header as malformed', () => {
      const candidate = validator.extractCandidate(post({ headers: { 'x-csrf-token': ['a', 'b'] } }));

      expect(candidate).toEqual({ source: 'header', value: null });
    });

    it('should ignore inherited body properties', () => {
      const body = Object.create({ _token: 'inherited' });

      expect(validator.extractCandidate(post({ body }))).toBeNull();
    });

    it('should return null when nothing is present', () => {
      expect(validator.extractCandidate(post({ body: 'raw text' }))).toBeNull();
    });
  });

  describe('validate', () => {
    it('should allow a matching field', () => {
      const result = validator.validate(post({ body: { _token: SESSION_TOKEN } }), SESSION_TOKEN);

      expect(result.decision).toEqual({ outcome: 'allowed', via: 'token' });
    });

    it('should allow a matching X-CSRF-TOKEN header', () => {
      const result = validator.validate(post({ headers: { 'x-csrf-token': SESSION_TOKEN } }), SESSION_TOKEN);

      expect(result.decision).toEqual({ outcome: 'allowed', via: 'token' });
    });

    it('should allow an encrypted cookie echoed as X-XSRF-TOKEN', () => {
      const echoed = encrypter.encrypt(SESSION_TOKEN, config.cookie.name);
      const result = validator.validate(post({ headers: { 'x-xsrf-token': echoed } }), SESSION_TOKEN);

      expect(result.decision).toEqual({ outcome: 'allowed', via: 'token' });
    });

    it('should reject a different token as a mismatch', () => {
      const result = validator.validate(post({ body: { _token: 'other-token' } }), SESSION_TOKEN);

      expect(result.decision).toEqual({ outcome: 'rejected', reason: 'TokenMismatch', source: 'field' });
    });

    it('should only check the first source found', () => {
      const result = validator.validate(post({
        body: { _token: 'other-token' },
        headers: { 'x-csrf-token': SESSION_TOKEN },
      }), SESSION_TOKEN);

      expect(result.decision).toEqual({ outcome: 'rejected', reason: 'TokenMismatch', source: 'field' });
    });

    it('should reject a missing candidate', () => {
      const result = validator.validate(post(), SESSION_TOKEN);

      expect(result.decision).toEqual({ outcome: 'rejected', reason: 'TokenMissing' });
    });

    it('should reject any candidate when the session has no token', () => {
      const result = validator.validate(post({ body: { _token: SESSION_TOKEN } }), null);

      expect(result.decision).toEqual({ outcome: 'rejected', reason: 'TokenMissing', source: 'field' });
    });

    it('should reject an empty candidate against an empty session token', () => {
      const result = validator.validate(post({ headers: { 'x-csrf-token': '' } }), '');

      expect(result.decision).toMatchObject({ outcome: 'rejected', reason: 'TokenMissing' });
    });

    it('should reject a malformed candidate', () => {
      const result = validator.validate(post({ headers: { 'x-xsrf-token': 'garbage' } }), SESSION_TOKEN);

      expect(result.decision).toEqual({ outcome: 'rejected', reason: 'TokenMalformed', source: 'xsrf-header' });
    });
  });
});

describe('safeCompare', () => {
  it('should compare by content', () => {
    expect(safeCompare('abc', 'abc')).toBe(true);
    expect(safeCompare('abc', 'abd')).toBe(false);
    expect(safeCompare('abc', 'abcd')).toBe(false);
  });
});
