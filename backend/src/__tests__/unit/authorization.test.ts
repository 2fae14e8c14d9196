/**
 * Unit Tests: Authorization Policy
 */

import { describe, it, expect } from 'vitest';
import type { Principal } from '@hamco/shared';
import { requires, rolesFor } from '../../application/auth/authorization.js';

const tokenPrincipal = (isAdmin: boolean): Principal => ({
  method: 'token',
  subjectId: 'user-1',
  label: 'user@example.com',
  roles: rolesFor(isAdmin),
  tokenId: 'jti-1',
  expiresAt: new Date('2026-01-01T01:00:00.000Z'),
});

const keyPrincipal = (isAdmin: boolean): Principal => ({
  method: 'key',
  subjectId: 'key-1',
  label: 'apikey:bot',
  roles: rolesFor(isAdmin),
  keyId: 'key-1',
  keyName: 'bot',
  expiresAt: null,
});

describe('rolesFor', () => {
  it('should map the elevated flag to exactly one role', () => {
    expect(rolesFor(true)).toEqual(['Admin']);
    expect(rolesFor(false)).toEqual(['User']);
  });
});

describe('requires', () => {
  it('should deny an absent principal as unauthenticated', () => {
    expect(requires(undefined, 'Admin')).toEqual({ allowed: false, reason: 'unauthenticated' });
    expect(requires(undefined, 'User')).toEqual({ allowed: false, reason: 'unauthenticated' });
  });

  it('should deny a principal without the role as forbidden', () => {
    expect(requires(tokenPrincipal(false), 'Admin')).toEqual({ allowed: false, reason: 'forbidden' });
  });

  it('should allow a principal holding the role', () => {
    expect(requires(tokenPrincipal(true), 'Admin')).toEqual({ allowed: true });
    expect(requires(tokenPrincipal(false), 'User')).toEqual({ allowed: true });
  });

  it('should not treat Admin as implying User', () => {
    expect(requires(tokenPrincipal(true), 'User')).toEqual({ allowed: false, reason: 'forbidden' });
  });

  it('should decide the same way for key and token principals', () => {
    expect(requires(keyPrincipal(true), 'Admin')).toEqual(requires(tokenPrincipal(true), 'Admin'));
    expect(requires(keyPrincipal(false), 'Admin')).toEqual(requires(tokenPrincipal(false), 'Admin'));
  });
});
