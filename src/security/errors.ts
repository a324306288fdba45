export type CsrfConfigErrorCode =
  | 'ExclusionConfigInvalid'
  | 'KeyInvalid'
  | 'ConfigInvalid'
  | 'SessionUnavailable';

/**
 * Raised while loading configuration or wiring the middleware.
 * Not recoverable at request time.
 */
export class CsrfConfigError extends Error {
  readonly code: CsrfConfigErrorCode;

  constructor(code: CsrfConfigErrorCode, message: string) {
    super(message);
    this.name = 'CsrfConfigError';
    this.code = code;
  }
}

/**
 * The secure random source failed. Indicates a broken environment; never retried.
 */
export class RandomSourceExhaustedError extends Error {
  readonly code = 'RandomSourceExhausted';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RandomSourceExhaustedError';
  }
}
