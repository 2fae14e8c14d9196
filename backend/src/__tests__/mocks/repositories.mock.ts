/**
 * In-memory repositories
 * Same contracts as the Pg implementations, for unit and integration tests
 */

import crypto from 'crypto';
import type { ApiKeyRecord, CreateApiKeyPayload, CreateUserPayload, User } from '@hamco/shared';
import type { ApiKeyRepository } from '../../infrastructure/repositories/apikey.repository.js';
import type { UserRepository } from '../../infrastructure/repositories/user.repository.js';

export class InMemoryApiKeyRepository implements ApiKeyRepository {
  readonly records: Map<string, ApiKeyRecord> = new Map();
  /** When set, every call rejects with this error */
  failWith: Error | null = null;

  async insert(payload: CreateApiKeyPayload): Promise<ApiKeyRecord> {
    this.checkFailure();
    const record: ApiKeyRecord = {
      ...payload,
      id: crypto.randomUUID(),
      createdAt: new Date(),
      isActive: true,
    };
    this.records.set(record.id, record);
    return record;
  }

  async findActiveByPrefix(prefix: string): Promise<ApiKeyRecord[]> {
    this.checkFailure();
    return [...this.records.values()].filter(r => r.keyPrefix === prefix && r.isActive);
  }

  async findById(id: string): Promise<ApiKeyRecord | null> {
    this.checkFailure();
    return this.records.get(id) ?? null;
  }

  async setActive(id: string, active: boolean): Promise<boolean> {
    this.checkFailure();
    const record = this.records.get(id);
    if (!record) {
      return false;
    }
    this.records.set(id, { ...record, isActive: active });
    return true;
  }

  async listByCreator(userId: string): Promise<ApiKeyRecord[]> {
    this.checkFailure();
    return [...this.records.values()].filter(r => r.createdByUserId === userId);
  }

  seed(record: ApiKeyRecord): void {
    this.records.set(record.id, record);
  }

  private checkFailure(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

export class InMemoryUserRepository implements UserRepository {
  readonly users: Map<string, User> = new Map();

  async findByEmail(email: string): Promise<User | null> {
    return [...this.users.values()].find(u => u.email === email) ?? null;
  }

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async create(payload: CreateUserPayload): Promise<User> {
    const user: User = {
      ...payload,
      id: crypto.randomUUID(),
      isAdmin: this.users.size === 0,
      isEmailVerified: false,
      passwordResetTokenHash: null,
      passwordResetTokenExpiresAt: null,
      createdAt: new Date(),
    };
    this.users.set(user.id, user);
    return user;
  }

  async setEmailVerificationToken(id: string, tokenHash: string, expiresAt: Date): Promise<void> {
    this.update(id, { emailVerificationTokenHash: tokenHash, emailVerificationTokenExpiresAt: expiresAt });
  }

  async findByEmailVerificationToken(tokenHash: string, now: Date): Promise<User | null> {
    return [...this.users.values()].find(u =>
      u.emailVerificationTokenHash === tokenHash &&
      u.emailVerificationTokenExpiresAt !== null &&
      u.emailVerificationTokenExpiresAt.getTime() > now.getTime()
    ) ?? null;
  }

  async markEmailVerified(id: string): Promise<void> {
    this.update(id, { isEmailVerified: true, emailVerificationTokenHash: null, emailVerificationTokenExpiresAt: null });
  }

  async setPasswordResetToken(id: string, tokenHash: string, expiresAt: Date): Promise<void> {
    this.update(id, { passwordResetTokenHash: tokenHash, passwordResetTokenExpiresAt: expiresAt });
  }

  async findByPasswordResetToken(tokenHash: string, now: Date): Promise<User | null> {
    return [...this.users.values()].find(u =>
      u.passwordResetTokenHash === tokenHash &&
      u.passwordResetTokenExpiresAt !== null &&
      u.passwordResetTokenExpiresAt.getTime() > now.getTime()
    ) ?? null;
  }

  async updatePassword(id: string, passwordHash: string): Promise<void> {
    this.update(id, { passwordHash, passwordResetTokenHash: null, passwordResetTokenExpiresAt: null });
  }

  seed(user: User): void {
    this.users.set(user.id, user);
  }

  private update(id: string, changes: Partial<User>): void {
    const user = this.users.get(id);
    if (user) {
      this.users.set(id, { ...user, ...changes });
    }
  }
}
