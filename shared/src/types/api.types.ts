/**
 * API request/response types for the Hamco API.
 */

import type { AuthMethod, Role } from './auth.types.js';

/** Standard API response wrapper */
export interface ApiResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: ApiError;
}

/** API error structure */
export interface ApiError {
  readonly code: string;
  readonly message: string;
}

/** Health check response */
export interface HealthCheckResponse {
  readonly status: 'healthy' | 'degraded' | 'unhealthy';
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly services: ServiceHealthMap;
}

export interface ServiceHealth {
  readonly status: 'up' | 'down' | 'disabled';
  readonly latencyMs?: number;
}

export interface ServiceHealthMap {
  readonly postgres: ServiceHealth;
  readonly redis: ServiceHealth;
}

/** Successful login */
export interface AuthResponse {
  readonly token: string;
  readonly userId: string;
  readonly email: string;
  readonly roles: readonly Role[];
  readonly expiresAt: string;
}

export interface ProfileResponse {
  readonly userId: string;
  readonly username: string;
  readonly email: string;
  readonly roles: readonly Role[];
  readonly isEmailVerified: boolean;
  readonly createdAt: string;
}

export interface RegistrationResponse {
  readonly message: string;
  readonly requiresEmailVerification: boolean;
  readonly email: string;
}

/** Claims of the current principal as exposed by GET /auth/me */
export interface PrincipalResponse {
  readonly subjectId: string;
  readonly label: string;
  readonly roles: readonly Role[];
  readonly method: AuthMethod;
}

/** Listing/read view of an API key. Never carries the secret or its hash. */
export interface ApiKeySummary {
  readonly id: string;
  readonly name: string;
  readonly prefix: string;
  readonly isAdmin: boolean;
  readonly isActive: boolean;
  readonly createdAt: string;
  readonly expiresAt: string | null;
}

/** Returned exactly once, by the generate call */
export interface GeneratedApiKeyResponse {
  readonly key: string;
  readonly id: string;
  readonly name: string;
  readonly prefix: string;
  readonly isAdmin: boolean;
  readonly createdAt: string;
  readonly expiresAt: string | null;
  readonly message: string;
}
