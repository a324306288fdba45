import { Request, Response, NextFunction, RequestHandler } from 'express';
import { CsrfGuard } from '../security/csrfGuard';
import { CsrfConfigError } from '../security/errors';
import { CookieInstruction, CsrfRequest, ValidationContext } from '../types/csrf';
import { SecurityLogger, sessionTag } from '../utils/securityLogger';

declare global {
  namespace Express {
    interface Request {
      csrfToken?: () => Promise<string>;
    }
  }
}

export type CsrfRejectionHandler = (req: Request, res: Response, context: ValidationContext) => void;

export interface CsrfMiddlewareOptions {
  /** Replaces the default 419 JSON response for rejected requests */
  onRejected?: CsrfRejectionHandler;
}

// bare `host[:port]` or `[ipv6][:port]`
const HOST_PATTERN = /^(?:[A-Za-z0-9.-]+|\[[0-9A-Fa-f:.]+\])(?::\d{1,5})?$/;

function requestPath(req: Request): string {
  try {
    // fixed origin, concatenated: a target like `//other.host/x` must stay a path
    return new URL(`http://localhost${req.originalUrl}`).pathname;
  } catch {
    return req.path;
  }
}

/**
 * Translate an Express request into the guard's transport-neutral shape.
 * The path comes from the request target alone; the Host header only feeds `uri`.
 */
export function toCsrfRequest(req: Request): CsrfRequest {
  const path = requestPath(req);
  const host = req.get('host');
  const uri = host && HOST_PATTERN.test(host) ? `${req.protocol}://${host.toLowerCase()}${path}` : undefined;

  return {
    method: req.method,
    path,
    uri,
    headers: req.headers,
    body: req.body,
  };
}

/**
 * Set a cookie, dropping any earlier Set-Cookie for the same name on this response
 */
export function replaceCookie(res: Response, instruction: CookieInstruction): void {
  const prefix = `${instruction.name}=`;
  const existing = res.getHeader('Set-Cookie');

  if (Array.isArray(existing)) {
    res.setHeader('Set-Cookie', existing.filter((cookie) => !cookie.startsWith(prefix)));
  } else if (typeof existing === 'string' && existing.startsWith(prefix)) {
    res.removeHeader('Set-Cookie');
  }

  res.cookie(instruction.name, instruction.value, instruction.options);
}

function rejectRequest(_req: Request, res: Response, context: ValidationContext): void {
  const reason = context.decision.outcome === 'rejected' ? context.decision.reason : undefined;
  res.status(419).json({
    success: false,
    message: 'CSRF token mismatch.',
    reason,
  });
}

/**
 * CSRF verification middleware. Must be mounted after express-session and the body parsers.
 */
export function csrfProtection(guard: CsrfGuard, options: CsrfMiddlewareOptions = {}): RequestHandler {
  const onRejected = options.onRejected ?? rejectRequest;

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const sessionId = req.sessionID;
      if (!sessionId) {
        throw new CsrfConfigError('SessionUnavailable', 'express-session must be mounted before csrfProtection');
      }

      const context = await guard.evaluate(toCsrfRequest(req), sessionId);

      // one store read per request: validation's copy, or a fresh token for a tokenless session
      const token = context.sessionToken ?? (await guard.currentToken(sessionId));
      if (guard.config.addCookie) {
        replaceCookie(res, guard.cookieFor(token));
      }
      res.locals.csrfToken = token;
      req.csrfToken = () => guard.currentToken(sessionId);

      if (context.decision.outcome === 'rejected') {
        SecurityLogger.warn('CSRF token rejected', {
          event: 'csrf_rejected',
          ip: req.ip,
          userAgent: req.get('user-agent'),
          method: context.method,
          path: context.path,
          reason: context.decision.reason,
          source: context.decision.source,
          sessionId: sessionTag(sessionId),
        });
        onRejected(req, res, context);
        return;
      }

      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Issue a fresh token after the session was regenerated (login, logout) and
 * send the matching cookie on this response.
 */
export async function rotateCsrfToken(guard: CsrfGuard, req: Request, res: Response): Promise<string> {
  const sessionId = req.sessionID;
  const token = await guard.regenerate(sessionId);
  req.csrfToken = () => guard.currentToken(sessionId);

  if (guard.config.addCookie) {
    replaceCookie(res, guard.cookieFor(token));
  }
  res.locals.csrfToken = token;
  return token;
}
