import { CsrfConfig, CsrfConfigInput, createCsrfConfig } from '../config/csrf';
import { StaticKeyProvider } from './cookieEncrypter';

export const TEST_KEY = Buffer.alloc(32, 7);

/**
 * Configuration for specs: fixed key, defaults otherwise.
 */
export function buildTestConfig(overrides: Partial<CsrfConfigInput> = {}): CsrfConfig {
  return createCsrfConfig({
    keys: new StaticKeyProvider(TEST_KEY),
    ...overrides,
  });
}
