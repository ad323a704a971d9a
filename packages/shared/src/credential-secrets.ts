import { createHmac, randomBytes, randomInt, timingSafeEqual } from 'node:crypto';
import { type CredentialSecrets } from '@careline/domain';

const SHORT_CODE_DIGITS = 8;
const LINK_TOKEN_BYTES = 16;

/**
 * HMAC-SHA256 over a server-side pepper. Plaintext codes and tokens are handed
 * back exactly once at issuance; only these digests are stored.
 */
export class PepperedCredentialSecrets implements CredentialSecrets {
  private readonly pepper: Buffer;

  constructor(pepper: string) {
    if (pepper.length < 16) {
      throw new Error('Pepper must be at least 16 characters');
    }
    this.pepper = Buffer.from(pepper, 'utf-8');
  }

  generateShortCode(): string {
    return String(randomInt(0, 10 ** SHORT_CODE_DIGITS)).padStart(SHORT_CODE_DIGITS, '0');
  }

  generateLinkToken(): string {
    return randomBytes(LINK_TOKEN_BYTES).toString('base64url');
  }

  hash(value: string): string {
    return createHmac('sha256', this.pepper).update(value, 'utf-8').digest('hex');
  }

  verify(value: string, storedHash: string): boolean {
    const expected = Buffer.from(storedHash, 'hex');
    const actual = Buffer.from(this.hash(value), 'hex');
    if (expected.length !== actual.length) return false;
    return timingSafeEqual(expected, actual);
  }
}
