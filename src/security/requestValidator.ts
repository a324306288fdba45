import crypto from 'crypto';
import { CsrfConfig } from '../config/csrf';
import { CsrfDecision, CsrfRequest, HeaderBag, TokenCandidate } from '../types/csrf';
import { CookieEncrypter } from './cookieEncrypter';

export interface ValidationResult {
  decision: CsrfDecision;
  candidate: TokenCandidate | null;
}

/**
 * Compare two strings in time independent of where they differ.
 * Both sides are hashed first so their lengths are not observable either.
 */
export function safeCompare(expected: string, actual: string): boolean {
  const a = crypto.createHash('sha256').update(expected, 'utf8').digest();
  const b = crypto.createHash('sha256').update(actual, 'utf8').digest();
  return crypto.timingSafeEqual(a, b);
}

function readHeader(headers: HeaderBag, name: string): string | string[] | undefined {
  const lower = name.toLowerCase();
  if (lower in headers) return headers[lower];

  const key = Object.keys(headers).find((candidate) => candidate.toLowerCase() === lower);
  return key === undefined ? undefined : headers[key];
}

function readField(body: unknown, name: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Object.prototype.hasOwnProperty.call(body, name) ? Reflect.get(body, name) : undefined;
  return value;
}

function isEmpty(value: unknown): boolean {
  return value === undefined || value === null || value === '' || (Array.isArray(value) && value.length === 0);
}

/**
 * Pulls the anti-forgery token out of a request and checks it against the session's token.
 */
export class RequestValidator {
  private readonly config: CsrfConfig;
  private readonly encrypter: CookieEncrypter;

  constructor(config: CsrfConfig, encrypter: CookieEncrypter) {
    this.config = config;
    this.encrypter = encrypter;
  }

  /**
   * First non-empty source wins: body field, then X-CSRF-TOKEN, then the
   * encrypted X-XSRF-TOKEN echo of the cookie.
   */
  extractCandidate(request: CsrfRequest): TokenCandidate | null {
    const field = readField(request.body, this.config.fieldName);
    if (!isEmpty(field)) {
      return { source: 'field', value: typeof field === 'string' ? field : null };
    }

    const header = readHeader(request.headers, this.config.headerName);
    if (!isEmpty(header)) {
      return { source: 'header', value: typeof header === 'string' ? header : null };
    }

    const xsrf = readHeader(request.headers, this.config.xsrfHeaderName);
    if (!isEmpty(xsrf)) {
      if (typeof xsrf !== 'string') return { source: 'xsrf-header', value: null };
      return {
        source: 'xsrf-header',
        value: this.encrypter.decrypt(xsrf, this.config.cookie.name),
      };
    }

    return null;
  }

  validate(request: CsrfRequest, sessionToken: string | null): ValidationResult {
    const candidate = this.extractCandidate(request);

    // An absent expected value never matches anything
    if (!sessionToken) {
      return { decision: { outcome: 'rejected', reason: 'TokenMissing', source: candidate?.source }, candidate };
    }
    if (candidate === null) {
      return { decision: { outcome: 'rejected', reason: 'TokenMissing' }, candidate };
    }
    if (candidate.value === null) {
      return { decision: { outcome: 'rejected', reason: 'TokenMalformed', source: candidate.source }, candidate };
    }
    if (!safeCompare(sessionToken, candidate.value)) {
      return { decision: { outcome: 'rejected', reason: 'TokenMismatch', source: candidate.source }, candidate };
    }

    return { decision: { outcome: 'allowed', via: 'token' }, candidate };
  }
}
