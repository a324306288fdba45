import { createApp } from './app';
import { CsrfConfig, loadCsrfConfig } from './config/csrf';
import { buildSessionConfig } from './config/session';
import { closeRedis } from './config/redis';
import { CsrfGuard } from './security/csrfGuard';
import { SessionStore } from './types/session';
import { MemorySessionStore } from './utils/memorySessionStore';
import { RedisSessionStore } from './utils/redisSessionStore';
import { SecurityLogger } from './utils/securityLogger';

const PORT = Number(process.env.PORT || 3000);

const ALLOWED_ORIGINS = (process.env.ALLOWED_ORIGINS || 'http://localhost:3000,http://localhost:5173')
  .split(',')
  .map((origin) => origin.trim())
  .filter((origin) => origin !== '');

let config: CsrfConfig;
try {
  config = loadCsrfConfig();
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  SecurityLogger.error('Invalid CSRF configuration', { event: 'csrf_config_error', details: message });
  console.error(`[FATAL] ${message}`);
  process.exit(1);
}

if (config.testing) {
  console.warn('[CSRF] CSRF_TESTING is enabled: every request bypasses token verification');
}

function createStore(): SessionStore {
  const ttlSeconds = Math.ceil(config.cookie.maxAgeMs / 1000);
  if (process.env.SESSION_DRIVER === 'redis') {
    return new RedisSessionStore(ttlSeconds);
  }
  return new MemorySessionStore(ttlSeconds);
}

const guard = CsrfGuard.create(config, createStore());
const app = createApp({
  guard,
  session: buildSessionConfig(config),
  allowedOrigins: ALLOWED_ORIGINS,
});

const server = app.listen(PORT, () => {
  console.log(`Server running on http://localhost:${PORT}`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received. Shutting down...`);
  server.close();
  await closeRedis();
  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error) => {
    console.error('Shutdown failed:', error);
    process.exit(1);
  });
});

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error) => {
    console.error('Shutdown failed:', error);
    process.exit(1);
  });
});
