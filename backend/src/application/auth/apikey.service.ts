/**
 * API Key Service
 * Issue, inspect and revoke API keys. The plaintext secret leaves this
 * service exactly once, in the result of `generate`.
 */

import type { ApiKeyRecord, ApiKeySummary, GeneratedApiKeyResponse } from '@hamco/shared';
import { createLogger } from '../../infrastructure/logging/logger.js';
import type { ApiKeyRepository } from '../../infrastructure/repositories/apikey.repository.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { ApiKeyCacheInvalidator } from './apikey-cache.service.js';
import type { ApiKeyCodec } from './apikey.codec.js';

const logger = createLogger('apikey-service');

export interface GenerateApiKeyInput {
  readonly name: string;
  readonly isAdmin?: boolean;
  readonly expiresAt?: Date | null;
}

export function toApiKeySummary(record: ApiKeyRecord): ApiKeySummary {
  return {
    id: record.id,
    name: record.name,
    prefix: record.keyPrefix,
    isAdmin: record.isAdmin,
    isActive: record.isActive,
    createdAt: record.createdAt.toISOString(),
    expiresAt: record.expiresAt ? record.expiresAt.toISOString() : null,
  };
}

export class ApiKeyService {
  constructor(
    private readonly repository: ApiKeyRepository,
    private readonly codec: ApiKeyCodec,
    private readonly cache: ApiKeyCacheInvalidator
  ) {}

  async generate(createdByUserId: string, input: GenerateApiKeyInput): Promise<GeneratedApiKeyResponse> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError('API key name is required');
    }
    const expiresAt = input.expiresAt ?? null;
    if (expiresAt && expiresAt.getTime() <= Date.now()) {
      throw new ValidationError('Expiration date must be in the future');
    }

    const key = this.codec.generate();
    const record = await this.repository.insert({
      name,
      keyHash: await this.codec.hash(key),
      keyPrefix: this.codec.derivePrefix(key),
      isAdmin: input.isAdmin ?? false,
      expiresAt,
      createdByUserId,
    });

    logger.info({ keyId: record.id, prefix: record.keyPrefix, createdByUserId }, 'API key generated');

    return {
      key,
      id: record.id,
      name: record.name,
      prefix: record.keyPrefix,
      isAdmin: record.isAdmin,
      createdAt: record.createdAt.toISOString(),
      expiresAt: record.expiresAt ? record.expiresAt.toISOString() : null,
      message: "Store this key securely. It won't be shown again.",
    };
  }

  /** Newest first */
  async list(createdByUserId: string): Promise<ApiKeySummary[]> {
    const records = await this.repository.listByCreator(createdByUserId);
    return [...records]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(toApiKeySummary);
  }

  async get(createdByUserId: string, id: string): Promise<ApiKeySummary> {
    const record = await this.repository.findById(id);
    if (!record || record.createdByUserId !== createdByUserId) {
      throw new NotFoundError('API key not found', 'API_KEY_NOT_FOUND');
    }
    return toApiKeySummary(record);
  }

  /**
   * Soft, terminal revocation. Revoking an already revoked key succeeds.
   */
  async revoke(id: string): Promise<void> {
    const found = await this.repository.setActive(id, false);
    if (!found) {
      throw new NotFoundError('API key not found', 'API_KEY_NOT_FOUND');
    }
    await this.cache.invalidate(id);
    logger.info({ keyId: id }, 'API key revoked');
  }
}
