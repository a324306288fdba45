import { ExclusionRule, SameSite } from '../types/csrf';
import { compileExclusionRules } from '../security/patternMatcher';
import { KeyProvider, StaticKeyProvider, parseAppKey } from '../security/cookieEncrypter';
import { MIN_TOKEN_BYTES } from '../security/tokenGenerator';
import { CsrfConfigError } from '../security/errors';

export const CSRF_COOKIE_NAME = 'XSRF-TOKEN';
export const CSRF_HEADER_NAME = 'X-CSRF-TOKEN';
export const XSRF_HEADER_NAME = 'X-XSRF-TOKEN';
export const CSRF_FIELD_NAME = '_token';

const DEFAULT_SESSION_LIFETIME_MINUTES = 120;

export interface CsrfCookieSettings {
  name: string;
  secure: boolean;
  sameSite: SameSite;
  path: string;
  domain?: string;
  maxAgeMs: number;
}

export interface CsrfConfig {
  except: readonly ExclusionRule[];
  /** Skips verification for every request. Only ever set explicitly. */
  testing: boolean;
  addCookie: boolean;
  tokenBytes: number;
  fieldName: string;
  headerName: string;
  xsrfHeaderName: string;
  cookie: Readonly<CsrfCookieSettings>;
  keys: KeyProvider;
}

export type CsrfConfigInput = Partial<Omit<CsrfConfig, 'except' | 'cookie' | 'keys'>> & {
  except?: readonly string[];
  cookie?: Partial<CsrfCookieSettings>;
  keys: KeyProvider;
};

/**
 * Build a frozen configuration value. Exclusion patterns are compiled here so that
 * a malformed pattern fails at startup rather than on a request.
 */
export function createCsrfConfig(input: CsrfConfigInput): CsrfConfig {
  const tokenBytes = input.tokenBytes ?? MIN_TOKEN_BYTES;
  if (!Number.isInteger(tokenBytes) || tokenBytes < MIN_TOKEN_BYTES) {
    throw new CsrfConfigError('ConfigInvalid', `CSRF token size must be at least ${MIN_TOKEN_BYTES} bytes`);
  }

  const cookie: CsrfCookieSettings = {
    name: CSRF_COOKIE_NAME,
    secure: false,
    sameSite: 'lax',
    path: '/',
    maxAgeMs: DEFAULT_SESSION_LIFETIME_MINUTES * 60 * 1000,
    ...input.cookie,
  };

  if (cookie.sameSite === 'none' && !cookie.secure) {
    throw new CsrfConfigError('ConfigInvalid', 'SameSite=None cookies must also be secure');
  }

  return Object.freeze({
    except: compileExclusionRules(input.except ?? []),
    testing: input.testing ?? false,
    addCookie: input.addCookie ?? true,
    tokenBytes,
    fieldName: input.fieldName ?? CSRF_FIELD_NAME,
    headerName: input.headerName ?? CSRF_HEADER_NAME,
    xsrfHeaderName: input.xsrfHeaderName ?? XSRF_HEADER_NAME,
    cookie: Object.freeze(cookie),
    keys: input.keys,
  });
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new CsrfConfigError('ConfigInvalid', `${name} must be "true" or "false", got "${value}"`);
}

function parseSameSite(value: string | undefined): SameSite {
  if (value === undefined || value === '') return 'lax';
  if (value === 'lax' || value === 'strict' || value === 'none') return value;
  throw new CsrfConfigError('ConfigInvalid', `SESSION_SAME_SITE must be lax, strict or none, got "${value}"`);
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CsrfConfigError('ConfigInvalid', `${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Session lifetime in minutes, shared by the session cookie, the XSRF cookie and the store TTL.
 */
export function sessionLifetimeMinutes(env: NodeJS.ProcessEnv = process.env): number {
  return parsePositiveInt('SESSION_LIFETIME', env.SESSION_LIFETIME, DEFAULT_SESSION_LIFETIME_MINUTES);
}

/**
 * Load CSRF configuration from the environment. Called once at startup.
 */
export function loadCsrfConfig(env: NodeJS.ProcessEnv = process.env): CsrfConfig {
  const appKey = env.APP_KEY;
  if (!appKey) {
    throw new CsrfConfigError('KeyInvalid', 'APP_KEY environment variable is required but not set');
  }

  const keys = new StaticKeyProvider(
    parseAppKey(appKey),
    splitList(env.APP_PREVIOUS_KEYS).map(parseAppKey)
  );

  return createCsrfConfig({
    except: splitList(env.CSRF_EXCEPT),
    testing: parseBoolean('CSRF_TESTING', env.CSRF_TESTING, false),
    addCookie: parseBoolean('CSRF_ADD_COOKIE', env.CSRF_ADD_COOKIE, true),
    tokenBytes: parsePositiveInt('CSRF_TOKEN_BYTES', env.CSRF_TOKEN_BYTES, MIN_TOKEN_BYTES),
    cookie: {
      secure: parseBoolean('SESSION_SECURE_COOKIE', env.SESSION_SECURE_COOKIE, env.NODE_ENV === 'production'),
      sameSite: parseSameSite(env.SESSION_SAME_SITE),
      path: env.SESSION_PATH || '/',
      domain: env.SESSION_DOMAIN || undefined,
      maxAgeMs: sessionLifetimeMinutes(env) * 60 * 1000,
    },
    keys,
  });
}
