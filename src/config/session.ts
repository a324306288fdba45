import { RequestHandler } from 'express';
import session from 'express-session';
import crypto from 'crypto';
import { SessionConfig } from '../types/session';
import { CsrfConfig } from './csrf';

/**
 * express-session settings. The session cookie shares scope and lifetime with the
 * XSRF-TOKEN cookie but stays HTTP-only.
 */
export function buildSessionConfig(csrf: CsrfConfig, env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const { secure, sameSite, path, domain, maxAgeMs } = csrf.cookie;

  return {
    secret: env.SESSION_SECRET || crypto.randomBytes(32).toString('hex'),
    resave: false,
    saveUninitialized: true,
    cookie: {
      secure,
      httpOnly: true,
      maxAge: maxAgeMs,
      sameSite,
      path,
      ...(domain ? { domain } : {}),
    },
  };
}

export function createSessionMiddleware(config: SessionConfig): RequestHandler {
  return session(config);
}
