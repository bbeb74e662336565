import { describe, it, expect } from 'vitest';
import { HashingService } from '../../src/services/hashing.service.js';

describe('HashingService', () => {
  const hashing = new HashingService();

  describe('digest', () => {
    it('should produce the SHA256 hex digest', () => {
      expect(hashing.digest('abc')).toBe(
        'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
      );
    });

    it('should hash the empty string', () => {
      expect(hashing.digest('')).toBe(
        'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
      );
    });

    it('should be deterministic', () => {
      expect(hashing.digest('pw123')).toBe(hashing.digest('pw123'));
    });

    it('should give different digests for different inputs', () => {
      expect(hashing.digest('flag{abc}')).not.toBe(hashing.digest('flag{abd}'));
    });

    it('should always return 64 lowercase hex characters', () => {
      for (const input of ['a', 'pässwörd', '🚩', 'x'.repeat(10_000)]) {
        expect(hashing.digest(input)).toMatch(/^[0-9a-f]{64}$/);
      }
    });
  });

  describe('matches', () => {
    it('should accept the plaintext a digest was made from', () => {
      const stored = hashing.digest('flag{abc}');
      expect(hashing.matches('flag{abc}', stored)).toBe(true);
    });

    it('should reject a different plaintext', () => {
      const stored = hashing.digest('flag{abc}');
      expect(hashing.matches('flag{ABC}', stored)).toBe(false);
    });

    it('should reject a digest of the wrong length', () => {
      expect(hashing.matches('flag{abc}', 'deadbeef')).toBe(false);
    });
  });
});
