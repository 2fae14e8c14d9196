/**
 * User Repository
 *
 * Table `users`:
 *   id uuid PK, username text, email text UNIQUE (lowercase), password_hash text,
 *   is_admin boolean, is_email_verified boolean,
 *   email_verification_token_hash text NULL, email_verification_token_expires_at timestamptz NULL,
 *   password_reset_token_hash text NULL, password_reset_token_expires_at timestamptz NULL,
 *   created_at timestamptz
 */

import crypto from 'crypto';
import type { Pool } from 'pg';
import type { CreateUserPayload, User } from '@hamco/shared';
import { timedQuery } from '../database/postgres.client.js';

export interface UserRepository {
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  /** Admin iff the store held no users; concurrent first registrations yield one admin */
  create(payload: CreateUserPayload): Promise<User>;
  setEmailVerificationToken(id: string, tokenHash: string, expiresAt: Date): Promise<void>;
  /** Unexpired match only */
  findByEmailVerificationToken(tokenHash: string, now: Date): Promise<User | null>;
  markEmailVerified(id: string): Promise<void>;
  setPasswordResetToken(id: string, tokenHash: string, expiresAt: Date): Promise<void>;
  /** Unexpired match only */
  findByPasswordResetToken(tokenHash: string, now: Date): Promise<User | null>;
  /** Stores the new hash and clears any reset token */
  updatePassword(id: string, passwordHash: string): Promise<void>;
}

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  is_admin: boolean;
  is_email_verified: boolean;
  email_verification_token_hash: string | null;
  email_verification_token_expires_at: Date | null;
  password_reset_token_hash: string | null;
  password_reset_token_expires_at: Date | null;
  created_at: Date;
}

// Held for the duration of a user insert
const FIRST_USER_LOCK_KEY = 0x68616d63;

const COLUMNS = `id, username, email, password_hash, is_admin, is_email_verified,
  email_verification_token_hash, email_verification_token_expires_at,
  password_reset_token_hash, password_reset_token_expires_at, created_at`;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    isAdmin: row.is_admin,
    isEmailVerified: row.is_email_verified,
    emailVerificationTokenHash: row.email_verification_token_hash,
    emailVerificationTokenExpiresAt: row.email_verification_token_expires_at,
    passwordResetTokenHash: row.password_reset_token_hash,
    passwordResetTokenExpiresAt: row.password_reset_token_expires_at,
    createdAt: row.created_at,
  };
}

export class PgUserRepository implements UserRepository {
  constructor(private readonly db: Pool) {}

  private async findOne(where: string, values: unknown[]): Promise<User | null> {
    const { rows } = await timedQuery<UserRow>(
      this.db,
      `SELECT ${COLUMNS} FROM users WHERE ${where} LIMIT 1`,
      values
    );
    const row = rows[0];
    return row ? toUser(row) : null;
  }

  findByEmail(email: string): Promise<User | null> {
    return this.findOne('email = $1', [email]);
  }

  findById(id: string): Promise<User | null> {
    return this.findOne('id = $1', [id]);
  }

  async create(payload: CreateUserPayload): Promise<User> {
    const client = await this.db.connect();
    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock($1)', [FIRST_USER_LOCK_KEY]);
      const { rows } = await timedQuery<UserRow>(
        client,
        `INSERT INTO users (id, username, email, password_hash, is_admin, is_email_verified,
           email_verification_token_hash, email_verification_token_expires_at, created_at)
         VALUES ($1, $2, $3, $4, NOT EXISTS (SELECT 1 FROM users), FALSE, $5, $6, NOW())
         RETURNING ${COLUMNS}`,
        [
          crypto.randomUUID(),
          payload.username,
          payload.email,
          payload.passwordHash,
          payload.emailVerificationTokenHash,
          payload.emailVerificationTokenExpiresAt,
        ]
      );
      const row = rows[0];
      if (!row) {
        throw new Error('insert users returned no row');
      }
      await client.query('COMMIT');
      return toUser(row);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async setEmailVerificationToken(id: string, tokenHash: string, expiresAt: Date): Promise<void> {
    await timedQuery(
      this.db,
      `UPDATE users SET email_verification_token_hash = $2, email_verification_token_expires_at = $3 WHERE id = $1`,
      [id, tokenHash, expiresAt]
    );
  }

  findByEmailVerificationToken(tokenHash: string, now: Date): Promise<User | null> {
    return this.findOne(
      'email_verification_token_hash = $1 AND email_verification_token_expires_at > $2',
      [tokenHash, now]
    );
  }

  async markEmailVerified(id: string): Promise<void> {
    await timedQuery(
      this.db,
      `UPDATE users SET is_email_verified = TRUE,
         email_verification_token_hash = NULL, email_verification_token_expires_at = NULL
       WHERE id = $1`,
      [id]
    );
  }

  async setPasswordResetToken(id: string, tokenHash: string, expiresAt: Date): Promise<void> {
    await timedQuery(
      this.db,
      `UPDATE users SET password_reset_token_hash = $2, password_reset_token_expires_at = $3 WHERE id = $1`,
      [id, tokenHash, expiresAt]
    );
  }

  findByPasswordResetToken(tokenHash: string, now: Date): Promise<User | null> {
    return this.findOne(
      'password_reset_token_hash = $1 AND password_reset_token_expires_at > $2',
      [tokenHash, now]
    );
  }

  async updatePassword(id: string, passwordHash: string): Promise<void> {
    await timedQuery(
      this.db,
      `UPDATE users SET password_hash = $2,
         password_reset_token_hash = NULL, password_reset_token_expires_at = NULL
       WHERE id = $1`,
      [id, passwordHash]
    );
  }
}
