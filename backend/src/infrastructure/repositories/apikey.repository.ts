/**
 * API Key Repository
 *
 * Table `api_keys`:
 *   id uuid PK, name text, key_hash text, key_prefix char(8) (indexed),
 *   is_admin boolean, expires_at timestamptz NULL, created_at timestamptz,
 *   created_by_user_id uuid, is_active boolean
 *
 * Rows are never deleted: revocation flips `is_active`.
 */

import crypto from 'crypto';
import type { ApiKeyRecord, CreateApiKeyPayload } from '@hamco/shared';
import { timedQuery, type Queryable } from '../database/postgres.client.js';

export interface ApiKeyRepository {
  insert(payload: CreateApiKeyPayload): Promise<ApiKeyRecord>;
  /** Active keys sharing a display prefix; candidates still need hash verification */
  findActiveByPrefix(prefix: string): Promise<ApiKeyRecord[]>;
  findById(id: string): Promise<ApiKeyRecord | null>;
  /** Returns false when no row has this id */
  setActive(id: string, active: boolean): Promise<boolean>;
  listByCreator(userId: string): Promise<ApiKeyRecord[]>;
}

interface ApiKeyRow {
  id: string;
  name: string;
  key_hash: string;
  key_prefix: string;
  is_admin: boolean;
  expires_at: Date | null;
  created_at: Date;
  created_by_user_id: string;
  is_active: boolean;
}

const COLUMNS = `id, name, key_hash, key_prefix, is_admin, expires_at, created_at, created_by_user_id, is_active`;

function toRecord(row: ApiKeyRow): ApiKeyRecord {
  return {
    id: row.id,
    name: row.name,
    keyHash: row.key_hash,
    keyPrefix: row.key_prefix,
    isAdmin: row.is_admin,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
    createdByUserId: row.created_by_user_id,
    isActive: row.is_active,
  };
}

export class PgApiKeyRepository implements ApiKeyRepository {
  constructor(private readonly db: Queryable) {}

  async insert(payload: CreateApiKeyPayload): Promise<ApiKeyRecord> {
    const { rows } = await timedQuery<ApiKeyRow>(
      this.db,
      `INSERT INTO api_keys (id, name, key_hash, key_prefix, is_admin, expires_at, created_at, created_by_user_id, is_active)
       VALUES ($1, $2, $3, $4, $5, $6, NOW(), $7, TRUE)
       RETURNING ${COLUMNS}`,
      [
        crypto.randomUUID(),
        payload.name,
        payload.keyHash,
        payload.keyPrefix,
        payload.isAdmin,
        payload.expiresAt,
        payload.createdByUserId,
      ]
    );
    const row = rows[0];
    if (!row) {
      throw new Error('insert api_keys returned no row');
    }
    return toRecord(row);
  }

  async findActiveByPrefix(prefix: string): Promise<ApiKeyRecord[]> {
    const { rows } = await timedQuery<ApiKeyRow>(
      this.db,
      `SELECT ${COLUMNS} FROM api_keys WHERE key_prefix = $1 AND is_active = TRUE`,
      [prefix]
    );
    return rows.map(toRecord);
  }

  async findById(id: string): Promise<ApiKeyRecord | null> {
    const { rows } = await timedQuery<ApiKeyRow>(
      this.db,
      `SELECT ${COLUMNS} FROM api_keys WHERE id = $1 LIMIT 1`,
      [id]
    );
    const row = rows[0];
    return row ? toRecord(row) : null;
  }

  async setActive(id: string, active: boolean): Promise<boolean> {
    const { rowCount } = await timedQuery(
      this.db,
      `UPDATE api_keys SET is_active = $2 WHERE id = $1`,
      [id, active]
    );
    return (rowCount ?? 0) > 0;
  }

  async listByCreator(userId: string): Promise<ApiKeyRecord[]> {
    const { rows } = await timedQuery<ApiKeyRow>(
      this.db,
      `SELECT ${COLUMNS} FROM api_keys WHERE created_by_user_id = $1 ORDER BY created_at DESC`,
      [userId]
    );
    return rows.map(toRecord);
  }
}
