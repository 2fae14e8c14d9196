/**
 * API Key Resolver
 * Storage-backed resolution of a presented secret to a principal.
 *
 * The display prefix narrows the candidate set; every candidate that is
 * still usable is bcrypt-verified until one matches.
 */

import type { ApiKeyRecord, KeyPrincipal } from '@hamco/shared';
import type { ApiKeyRepository } from '../../infrastructure/repositories/apikey.repository.js';
import type { ApiKeyCodec } from './apikey.codec.js';
import { rolesFor } from './authorization.js';

export interface ApiKeyResolver {
  /**
   * Resolves to null for malformed, unknown, revoked or expired keys.
   * Rejects only when storage cannot be reached.
   */
  resolve(secret: string): Promise<KeyPrincipal | null>;
}

/** Expiry is inclusive: a key is no longer valid at its `expiresAt` instant */
export function isExpired(expiresAt: Date | null, now: number = Date.now()): boolean {
  return expiresAt !== null && expiresAt.getTime() <= now;
}

export function isApiKeyUsable(record: ApiKeyRecord, now: number = Date.now()): boolean {
  return record.isActive && !isExpired(record.expiresAt, now);
}

export function toKeyPrincipal(record: ApiKeyRecord): KeyPrincipal {
  return {
    method: 'key',
    subjectId: record.id,
    label: `apikey:${record.name}`,
    roles: rolesFor(record.isAdmin),
    keyId: record.id,
    keyName: record.name,
    expiresAt: record.expiresAt,
  };
}

export class StoreApiKeyResolver implements ApiKeyResolver {
  constructor(
    private readonly repository: ApiKeyRepository,
    private readonly codec: ApiKeyCodec
  ) {}

  async resolve(secret: string): Promise<KeyPrincipal | null> {
    if (!this.codec.isWellFormed(secret)) {
      return null;
    }

    const candidates = await this.repository.findActiveByPrefix(this.codec.derivePrefix(secret));
    const now = Date.now();

    for (const candidate of candidates) {
      if (!isApiKeyUsable(candidate, now)) {
        continue;
      }
      if (await this.codec.verify(secret, candidate.keyHash)) {
        return toKeyPrincipal(candidate);
      }
    }

    return null;
  }
}
