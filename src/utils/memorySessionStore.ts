import { CsrfConfigError } from '../security/errors';
import { SessionStore } from '../types/session';

export const DEFAULT_SESSION_TTL_SECONDS = 120 * 60;
const SWEEP_INTERVAL_MS = 60 * 1000;

interface Entry {
  value: string;
  expiresAt: number;
}

export type Clock = () => number;

/**
 * In-process SessionStore for single-instance deployments and tests.
 * Values are not shared between processes. Like the Redis driver, every write
 * (re)starts a TTL of one session lifetime; expired values are dropped when read
 * and by a sweep that runs on writes at most once a minute.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Map<string, Entry>>();
  private readonly ttlMs: number;
  private readonly now: Clock;
  private nextSweepAt: number;

  constructor(ttlSeconds: number = DEFAULT_SESSION_TTL_SECONDS, now: Clock = Date.now) {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new CsrfConfigError('ConfigInvalid', `Session TTL must be positive, got ${ttlSeconds}`);
    }
    this.ttlMs = ttlSeconds * 1000;
    this.now = now;
    this.nextSweepAt = now() + Math.min(this.ttlMs, SWEEP_INTERVAL_MS);
  }

  async get(sessionId: string, key: string): Promise<string | null> {
    return this.live(sessionId, key)?.value ?? null;
  }

  async set(sessionId: string, key: string, value: string): Promise<void> {
    this.sweep();
    this.write(sessionId, key, value);
  }

  async setIfAbsent(sessionId: string, key: string, value: string): Promise<string> {
    this.sweep();
    const existing = this.live(sessionId, key);
    if (existing) return existing.value;

    this.write(sessionId, key, value);
    return value;
  }

  async delete(sessionId: string, key: string): Promise<void> {
    this.remove(sessionId, key);
  }

  /** Sessions currently holding at least one value, expired or not yet swept */
  get size(): number {
    return this.sessions.size;
  }

  private live(sessionId: string, key: string): Entry | undefined {
    const entry = this.sessions.get(sessionId)?.get(key);
    if (entry && entry.expiresAt <= this.now()) {
      this.remove(sessionId, key);
      return undefined;
    }
    return entry;
  }

  private write(sessionId: string, key: string, value: string): void {
    let bucket = this.sessions.get(sessionId);
    if (!bucket) {
      bucket = new Map();
      this.sessions.set(sessionId, bucket);
    }
    bucket.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  private remove(sessionId: string, key: string): void {
    const bucket = this.sessions.get(sessionId);
    if (!bucket) return;

    bucket.delete(key);
    if (bucket.size === 0) this.sessions.delete(sessionId);
  }

  private sweep(): void {
    const now = this.now();
    if (now < this.nextSweepAt) return;

    for (const [sessionId, bucket] of this.sessions) {
      for (const [key, entry] of bucket) {
        if (entry.expiresAt <= now) bucket.delete(key);
      }
      if (bucket.size === 0) this.sessions.delete(sessionId);
    }
    this.nextSweepAt = now + Math.min(this.ttlMs, SWEEP_INTERVAL_MS);
  }
}
