export type CsrfState =
  | 'INIT'
  | 'METHOD_CHECK'
  | 'EXCLUSION_CHECK'
  | 'TOKEN_VALIDATION'
  | 'ALLOWED'
  | 'REJECTED';

export type CsrfRejectReason = 'TokenMissing' | 'TokenMismatch' | 'TokenMalformed';

export type TokenSource = 'field' | 'header' | 'xsrf-header';

export type CsrfDecision =
  | { outcome: 'allowed'; via: 'safe_method' | 'excluded' | 'testing' | 'token' }
  | { outcome: 'rejected'; reason: CsrfRejectReason; source?: TokenSource };

/**
 * A token pulled out of a request. `value` is null when the source was present
 * but could not be read (wrong shape, failed decryption).
 */
export interface TokenCandidate {
  source: TokenSource;
  value: string | null;
}

export type HeaderBag = Record<string, string | string[] | undefined>;

/**
 * Transport-neutral view of an incoming request.
 */
export interface CsrfRequest {
  method: string;
  /** Raw (possibly percent-encoded) request path, without query string */
  path: string;
  /** Full request URI including scheme and host, when known */
  uri?: string;
  headers: HeaderBag;
  body?: unknown;
}

export interface ValidationContext {
  method: string;
  path: string;
  uri: string | null;
  states: CsrfState[];
  candidate: TokenCandidate | null;
  sessionToken: string | null;
  decision: CsrfDecision;
}

export interface ExclusionRule {
  pattern: string;
  scope: 'path' | 'uri';
  kind: 'literal' | 'wildcard';
  regex: RegExp | null;
}

export interface MatchTarget {
  path: string;
  uri: string | null;
}

export type SameSite = 'lax' | 'strict' | 'none';

export interface CookieOptions {
  httpOnly: false;
  secure: boolean;
  sameSite: SameSite;
  path: string;
  domain?: string;
  maxAge: number;
}

export interface CookieInstruction {
  name: string;
  value: string;
  options: CookieOptions;
}
