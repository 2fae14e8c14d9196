/**
 * Persistent records owned by the auth core (stored in PostgreSQL).
 * Plaintext passwords and API key secrets never appear here.
 */

export type UserId = string;
export type ApiKeyId = string;

/** Credential record for a human user */
export interface User {
  readonly id: UserId;
  readonly username: string;
  /** Trimmed and lowercased; unique login handle */
  readonly email: string;
  readonly passwordHash: string;
  readonly isAdmin: boolean;
  readonly isEmailVerified: boolean;
  readonly emailVerificationTokenHash: string | null;
  readonly emailVerificationTokenExpiresAt: Date | null;
  readonly passwordResetTokenHash: string | null;
  readonly passwordResetTokenExpiresAt: Date | null;
  readonly createdAt: Date;
}

/** `isAdmin` is decided by the store: the first account in an empty store gets it */
export interface CreateUserPayload {
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly emailVerificationTokenHash: string;
  readonly emailVerificationTokenExpiresAt: Date;
}

/** Long-lived credential for automated callers */
export interface ApiKeyRecord {
  readonly id: ApiKeyId;
  readonly name: string;
  readonly keyHash: string;
  /** First 8 characters of the plaintext secret; display only */
  readonly keyPrefix: string;
  /** Elevated keys authenticate with the Admin role */
  readonly isAdmin: boolean;
  readonly expiresAt: Date | null;
  readonly createdAt: Date;
  readonly createdByUserId: string;
  readonly isActive: boolean;
}

export interface CreateApiKeyPayload {
  readonly name: string;
  readonly keyHash: string;
  readonly keyPrefix: string;
  readonly isAdmin: boolean;
  readonly expiresAt: Date | null;
  readonly createdByUserId: string;
}
