export * from './types/csrf';
export * from './types/session';
export * from './security/errors';
export { TokenGenerator, MIN_TOKEN_BYTES } from './security/tokenGenerator';
export type { RandomSource } from './security/tokenGenerator';
export { SessionTokenStore } from './security/sessionTokenStore';
export { compileExclusionRules, isExcluded, matches, normalizePath, normalizeUri } from './security/patternMatcher';
export { RequestValidator, safeCompare } from './security/requestValidator';
export { CookieEncrypter, StaticKeyProvider, parseAppKey } from './security/cookieEncrypter';
export type { KeyProvider } from './security/cookieEncrypter';
export { CookieIssuer } from './security/cookieIssuer';
export { CsrfGuard } from './security/csrfGuard';
export { createCsrfConfig, loadCsrfConfig } from './config/csrf';
export type { CsrfConfig, CsrfConfigInput } from './config/csrf';
export { csrfProtection, rotateCsrfToken, toCsrfRequest } from './middleware/csrf';
export type { CsrfMiddlewareOptions } from './middleware/csrf';
export { MemorySessionStore } from './utils/memorySessionStore';
export { RedisSessionStore } from './utils/redisSessionStore';
