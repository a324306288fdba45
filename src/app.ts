import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import cors from 'cors';

import { SessionConfig } from './types/session';
import { createSessionMiddleware } from './config/session';
import { CsrfGuard } from './security/csrfGuard';
import { csrfProtection, rotateCsrfToken } from './middleware/csrf';
import { SecurityLogger } from './utils/securityLogger';

declare module 'express-session' {
  interface SessionData {
    username?: string;
  }
}

export interface AppOptions {
  guard: CsrfGuard;
  session: SessionConfig;
  allowedOrigins?: string[];
}

function regenerateSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => (err ? reject(err) : resolve()));
  });
}

/**
 * Compose the HTTP pipeline: session first, then CSRF verification, then handlers.
 */
export function createApp({ guard, session, allowedOrigins = [] }: AppOptions): Express {
  const app = express();

  app.use(helmet());

  app.use(cors({
    origin: (origin, callback) => {
      if (!origin) return callback(null, true);
      if (allowedOrigins.includes(origin)) return callback(null, true);
      console.warn(`CORS blocked origin: ${origin}`);
      return callback(new Error('Not allowed by CORS'), false);
    },
    credentials: true,
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', guard.config.headerName, guard.config.xsrfHeaderName],
  }));

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(cookieParser());
  app.use(createSessionMiddleware(session));
  app.use(csrfProtection(guard));

  // =====================================================
  // ROUTES
  // =====================================================

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get('/api/csrf-token', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ token: await guard.currentToken(req.sessionID) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/login', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { username } = req.body ?? {};
      if (typeof username !== 'string' || username.trim() === '') {
        res.status(422).json({ success: false, message: 'Username is required' });
        return;
      }

      const previous = req.sessionID;
      await regenerateSession(req);
      await guard.forget(previous);
      req.session.username = username.trim();

      const token = await rotateCsrfToken(guard, req, res);
      res.json({ success: true, username: req.session.username, token });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/logout', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const previous = req.sessionID;
      await regenerateSession(req);
      await guard.forget(previous);

      const token = await rotateCsrfToken(guard, req, res);
      res.json({ success: true, token });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/profile', (req: Request, res: Response) => {
    if (!req.session.username) {
      res.status(401).json({ success: false, message: 'Unauthenticated' });
      return;
    }
    res.json({ success: true, username: req.session.username, profile: req.body?.profile ?? null });
  });

  // Third-party callback; only reachable without a token when listed in CSRF_EXCEPT
  app.post('/stripe/webhook', (_req: Request, res: Response) => {
    res.json({ received: true });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    SecurityLogger.error('Unhandled error', {
      event: 'system_error',
      path: req.path,
      method: req.method,
      details: err instanceof Error ? { name: err.name, message: err.message } : String(err),
    });
    res.status(500).json({ success: false, message: 'Internal server error' });
  });

  return app;
}
