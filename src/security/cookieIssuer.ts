import { CsrfConfig } from '../config/csrf';
import { CookieInstruction } from '../types/csrf';
import { CookieEncrypter } from './cookieEncrypter';
import { SessionTokenStore } from './sessionTokenStore';

/**
 * Emits the script-readable XSRF-TOKEN cookie carrying the session's current token,
 * encrypted. Front-end HTTP clients echo it back in the X-XSRF-TOKEN header.
 */
export class CookieIssuer {
  private readonly config: CsrfConfig;
  private readonly encrypter: CookieEncrypter;
  private readonly tokens: SessionTokenStore;

  constructor(config: CsrfConfig, encrypter: CookieEncrypter, tokens: SessionTokenStore) {
    this.config = config;
    this.encrypter = encrypter;
    this.tokens = tokens;
  }

  async issue(sessionId: string): Promise<CookieInstruction> {
    const token = await this.tokens.currentToken(sessionId);
    return this.forToken(token);
  }

  forToken(token: string): CookieInstruction {
    const { name, secure, sameSite, path, domain, maxAgeMs } = this.config.cookie;

    return {
      name,
      value: this.encrypter.encrypt(token, name),
      options: {
        httpOnly: false,
        secure,
        sameSite,
        path,
        ...(domain ? { domain } : {}),
        maxAge: maxAgeMs,
      },
    };
  }
}
