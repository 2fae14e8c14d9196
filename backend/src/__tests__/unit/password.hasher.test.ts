/**
 * Unit Tests: Password Hasher
 */

import { describe, it, expect } from 'vitest';
import { BcryptPasswordHasher } from '../../application/auth/password.hasher.js';

describe('BcryptPasswordHasher', () => {
  const hasher = new BcryptPasswordHasher(4);

  it('should verify a password against its own hash', async () => {
    const hash = await hasher.hash('correct horse battery');

    expect(hash.startsWith('$2b$04$')).toBe(true);
    expect(await hasher.verify('correct horse battery', hash)).toBe(true);
  });

  it('should reject a different password', async () => {
    const hash = await hasher.hash('correct horse battery');

    expect(await hasher.verify('correct horse staple', hash)).toBe(false);
  });

  it('should salt every hash', async () => {
    const first = await hasher.hash('same-input');
    const second = await hasher.hash('same-input');

    expect(first).not.toBe(second);
  });

  it('should return false for an empty stored hash', async () => {
    expect(await hasher.verify('anything', '')).toBe(false);
  });

  it('should return false instead of throwing for a malformed stored hash', async () => {
    await expect(hasher.verify('anything', 'not-a-bcrypt-hash')).resolves.toBe(false);
  });
});
