/**
 * Key-value persistence scoped to a session id.
 */
export interface SessionStore {
  get(sessionId: string, key: string): Promise<string | null>;
  set(sessionId: string, key: string, value: string): Promise<void>;
  /**
   * Atomically stores `value` unless the key already holds one.
   * Resolves with whichever value is stored afterwards.
   */
  setIfAbsent(sessionId: string, key: string, value: string): Promise<string>;
  delete(sessionId: string, key: string): Promise<void>;
}

export interface SessionConfig {
  secret: string;
  resave: boolean;
  saveUninitialized: boolean;
  cookie: {
    secure: boolean;
    httpOnly: boolean;
    maxAge: number;
    sameSite: 'strict' | 'lax' | 'none';
    path: string;
    domain?: string;
  };
}
