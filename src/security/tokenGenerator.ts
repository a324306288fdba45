import crypto from 'crypto';
import { CsrfConfigError, RandomSourceExhaustedError } from './errors';

export const MIN_TOKEN_BYTES = 32;

export type RandomSource = (size: number) => Buffer;

/**
 * Produces unpredictable, URL-safe anti-forgery tokens.
 */
export class TokenGenerator {
  private readonly bytes: number;
  private readonly randomSource: RandomSource;

  constructor(bytes: number = MIN_TOKEN_BYTES, randomSource: RandomSource = crypto.randomBytes) {
    if (!Number.isInteger(bytes) || bytes < MIN_TOKEN_BYTES) {
      throw new CsrfConfigError(
        'ConfigInvalid',
        `Token size must be an integer of at least ${MIN_TOKEN_BYTES} bytes, got ${bytes}`
      );
    }
    this.bytes = bytes;
    this.randomSource = randomSource;
  }

  /**
   * Generate a fresh token, base64url encoded without padding.
   */
  generate(): string {
    let raw: Buffer;
    try {
      raw = this.randomSource(this.bytes);
    } catch (error) {
      throw new RandomSourceExhaustedError('Secure random source failed', { cause: error });
    }

    if (raw.length < this.bytes) {
      throw new RandomSourceExhaustedError(
        `Secure random source returned ${raw.length} of ${this.bytes} bytes`
      );
    }

    return raw.toString('base64url');
  }
}
