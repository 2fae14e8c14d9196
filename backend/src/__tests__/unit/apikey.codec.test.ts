/**
 * Unit Tests: API Key Codec
 */

import { describe, it, expect } from 'vitest';
import { ApiKeyCodec, KEY_PREFIX_LENGTH } from '../../application/auth/apikey.codec.js';
import { BcryptPasswordHasher } from '../../application/auth/password.hasher.js';

describe('ApiKeyCodec', () => {
  const codec = new ApiKeyCodec('hk', new BcryptPasswordHasher(4));

  describe('generate', () => {
    it('should produce the marker followed by 43 base64url characters', () => {
      const secret = codec.generate();

      expect(secret).toMatch(/^hk_[A-Za-z0-9_-]{43}$/);
    });

    it('should never repeat a secret and rarely repeat a prefix', () => {
      const secrets = Array.from({ length: 1000 }, () => codec.generate());
      const prefixes = new Set(secrets.map(s => codec.derivePrefix(s)));

      expect(new Set(secrets).size).toBe(1000);
      // 5 random characters of 64 symbols each; collisions at this sample size are rare
      expect(prefixes.size).toBeGreaterThanOrEqual(995);
    });
  });

  describe('derivePrefix', () => {
    it('should take the first 8 characters', () => {
      expect(KEY_PREFIX_LENGTH).toBe(8);
      expect(codec.derivePrefix('hk_abcdefghijklmnop')).toBe('hk_abcde');
    });
  });

  describe('isWellFormed', () => {
    it('should accept generated secrets', () => {
      expect(codec.isWellFormed(codec.generate())).toBe(true);
    });

    it('should accept a 32-character payload and reject 31', () => {
      expect(codec.isWellFormed(`hk_${'a'.repeat(32)}`)).toBe(true);
      expect(codec.isWellFormed(`hk_${'a'.repeat(31)}`)).toBe(false);
    });

    it('should reject another marker', () => {
      expect(codec.isWellFormed(`xx_${'a'.repeat(43)}`)).toBe(false);
      expect(codec.isWellFormed(`hk${'a'.repeat(44)}`)).toBe(false);
    });

    it('should reject characters outside the base64url alphabet', () => {
      expect(codec.isWellFormed(`hk_${'a'.repeat(42)}!`)).toBe(false);
      expect(codec.isWellFormed(`hk_${'a'.repeat(42)} `)).toBe(false);
    });

    it('should reject an empty string', () => {
      expect(codec.isWellFormed('')).toBe(false);
    });
  });

  describe('hash / verify', () => {
    it('should verify a secret only against its own hash', async () => {
      const first = codec.generate();
      const second = codec.generate();
      const firstHash = await codec.hash(first);
      const secondHash = await codec.hash(second);

      expect(firstHash).not.toBe(secondHash);
      expect(firstHash).not.toContain(first);
      expect(await codec.verify(first, firstHash)).toBe(true);
      expect(await codec.verify(second, firstHash)).toBe(false);
    });
  });
});
