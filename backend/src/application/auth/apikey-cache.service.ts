/**
 * API Key Cache Service
 * Short-lived cache in front of bcrypt verification for API key traffic.
 *
 * Entries are keyed by SHA-256 of the full secret and live for a few
 * seconds, so a revoked key stops authenticating within one TTL even when
 * eager eviction is missed. Removing this layer changes latency only.
 */

import crypto from 'crypto';
import type { KeyPrincipal, Role } from '@hamco/shared';
import { RedisKeys } from '../../infrastructure/database/redis.client.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { errorMessage } from '../errors.js';
import type { ApiKeyCodec } from './apikey.codec.js';
import { isExpired, type ApiKeyResolver } from './apikey.resolver.js';

const logger = createLogger('apikey-cache');

const DEFAULT_MAX_ENTRIES = 10000;

/** A cached positive (principal) or negative (null) validation result */
export interface KeyCacheEntry {
  readonly principal: KeyPrincipal | null;
}

export interface KeyCacheStore {
  get(digest: string): Promise<KeyCacheEntry | undefined>;
  set(digest: string, entry: KeyCacheEntry, ttlSeconds: number): Promise<void>;
  /** Drop any positive entry held for this key id */
  evictKey(keyId: string): Promise<void>;
}

export interface ApiKeyCacheInvalidator {
  invalidate(keyId: string): Promise<void>;
}

export const noopInvalidator: ApiKeyCacheInvalidator = {
  invalidate: async () => {},
};

export function digestSecret(secret: string): string {
  return crypto.createHash('sha256').update(secret).digest('hex');
}

/**
 * Per-process store. Node runs each request's callbacks on one thread, so
 * plain Maps are safe across concurrent requests.
 */
export class MemoryKeyCacheStore implements KeyCacheStore {
  private readonly entries = new Map<string, { entry: KeyCacheEntry; expiresAtMs: number }>();
  private readonly digestsByKeyId = new Map<string, string>();

  constructor(private readonly maxEntries: number = DEFAULT_MAX_ENTRIES) {}

  async get(digest: string): Promise<KeyCacheEntry | undefined> {
    const slot = this.entries.get(digest);
    if (!slot) {
      return undefined;
    }
    if (slot.expiresAtMs <= Date.now()) {
      this.remove(digest);
      return undefined;
    }
    return slot.entry;
  }

  async set(digest: string, entry: KeyCacheEntry, ttlSeconds: number): Promise<void> {
    this.remove(digest);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.remove(oldest.value);
    }
    this.entries.set(digest, { entry, expiresAtMs: Date.now() + ttlSeconds * 1000 });
    if (entry.principal) {
      this.digestsByKeyId.set(entry.principal.keyId, digest);
    }
  }

  async evictKey(keyId: string): Promise<void> {
    const digest = this.digestsByKeyId.get(keyId);
    if (digest !== undefined) {
      this.remove(digest);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  private remove(digest: string): void {
    const slot = this.entries.get(digest);
    if (slot?.entry.principal) {
      this.digestsByKeyId.delete(slot.entry.principal.keyId);
    }
    this.entries.delete(digest);
  }
}

interface SerializedPrincipal {
  subjectId: string;
  label: string;
  roles: Role[];
  keyId: string;
  keyName: string;
  expiresAt: string | null;
}

function serialize(principal: KeyPrincipal): SerializedPrincipal {
  return {
    subjectId: principal.subjectId,
    label: principal.label,
    roles: [...principal.roles],
    keyId: principal.keyId,
    keyName: principal.keyName,
    expiresAt: principal.expiresAt ? principal.expiresAt.toISOString() : null,
  };
}

function isRole(value: unknown): value is Role {
  return value === 'Admin' || value === 'User';
}

function deserialize(raw: string): KeyCacheEntry | undefined {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('principal' in parsed)) {
    return undefined;
  }
  const value = parsed.principal;
  if (value === null) {
    return { principal: null };
  }
  if (
    typeof value !== 'object' ||
    !('subjectId' in value) || typeof value.subjectId !== 'string' ||
    !('label' in value) || typeof value.label !== 'string' ||
    !('roles' in value) || !Array.isArray(value.roles) ||
    !('keyId' in value) || typeof value.keyId !== 'string' ||
    !('keyName' in value) || typeof value.keyName !== 'string' ||
    !('expiresAt' in value)
  ) {
    return undefined;
  }
  const roles: unknown[] = value.roles;
  const expiresAt = value.expiresAt;
  return {
    principal: {
      method: 'key',
      subjectId: value.subjectId,
      label: value.label,
      roles: roles.filter(isRole),
      keyId: value.keyId,
      keyName: value.keyName,
      expiresAt: typeof expiresAt === 'string' ? new Date(expiresAt) : null,
    },
  };
}

/** The ioredis commands the shared store issues */
export interface KeyCacheRedis {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
}

/**
 * Shared store for multi-replica deployments. Redis failures degrade to a
 * cache miss; the storage path still decides.
 */
export class RedisKeyCacheStore implements KeyCacheStore {
  constructor(private readonly redis: KeyCacheRedis) {}

  async get(digest: string): Promise<KeyCacheEntry | undefined> {
    try {
      const cached = await this.redis.get(RedisKeys.apiKeyCache(digest));
      return cached ? deserialize(cached) : undefined;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to read API key cache');
      return undefined;
    }
  }

  async set(digest: string, entry: KeyCacheEntry, ttlSeconds: number): Promise<void> {
    const payload = JSON.stringify({ principal: entry.principal ? serialize(entry.principal) : null });
    try {
      await this.redis.setex(RedisKeys.apiKeyCache(digest), ttlSeconds, payload);
      if (entry.principal) {
        await this.redis.setex(RedisKeys.apiKeyCacheIndex(entry.principal.keyId), ttlSeconds, digest);
      }
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to write API key cache');
    }
  }

  async evictKey(keyId: string): Promise<void> {
    try {
      const digest = await this.redis.get(RedisKeys.apiKeyCacheIndex(keyId));
      if (digest) {
        await this.redis.del(RedisKeys.apiKeyCache(digest), RedisKeys.apiKeyCacheIndex(keyId));
      }
    } catch (error) {
      // Entry still expires with its TTL
      logger.warn({ error: errorMessage(error), keyId }, 'Failed to evict API key cache entry');
    }
  }
}

/**
 * Decorates a resolver with a validation cache
 */
export class CachedApiKeyResolver implements ApiKeyResolver, ApiKeyCacheInvalidator {
  constructor(
    private readonly inner: ApiKeyResolver,
    private readonly store: KeyCacheStore,
    private readonly codec: ApiKeyCodec,
    private readonly ttlSeconds: number
  ) {}

  async resolve(secret: string): Promise<KeyPrincipal | null> {
    // Malformed input never reaches the cache or storage
    if (!this.codec.isWellFormed(secret)) {
      return null;
    }

    const digest = digestSecret(secret);
    const cached = await this.store.get(digest);

    if (cached) {
      if (cached.principal === null) {
        logger.debug({ prefix: this.codec.derivePrefix(secret) }, 'API key cache HIT (negative)');
        return null;
      }
      if (!isExpired(cached.principal.expiresAt)) {
        logger.debug({ prefix: this.codec.derivePrefix(secret) }, 'API key cache HIT');
        return cached.principal;
      }
      await this.store.evictKey(cached.principal.keyId);
    }

    const principal = await this.inner.resolve(secret);
    await this.store.set(digest, { principal }, this.ttlSeconds);
    return principal;
  }

  async invalidate(keyId: string): Promise<void> {
    await this.store.evictKey(keyId);
  }
}
