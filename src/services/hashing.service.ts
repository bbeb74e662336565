import { createHash, timingSafeEqual } from 'crypto';

export class HashingService {
  /**
   * SHA256 hex digest of the UTF-8 encoding of `text`.
   * Unsalted, so equal inputs always produce equal digests.
   */
  digest(text: string): string {
    return createHash('sha256').update(text, 'utf8').digest('hex');
  }

  /**
   * Check a plaintext secret against a stored digest
   */
  matches(text: string, expectedDigest: string): boolean {
    const computed = Buffer.from(this.digest(text), 'utf8');
    const expected = Buffer.from(expectedDigest, 'utf8');
    if (computed.length !== expected.length) {
      return false;
    }
    return timingSafeEqual(computed, expected);
  }
}
