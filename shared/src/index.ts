// Shared contracts for the Hamco API and its clients.
// Type-only: nothing here exists at runtime.

export type {
  Role,
  AuthMethod,
  TokenPrincipal,
  KeyPrincipal,
  Principal,
  DenialReason,
  AuthorizationDecision,
} from './types/auth.types.js';

export type {
  UserId,
  ApiKeyId,
  User,
  CreateUserPayload,
  ApiKeyRecord,
  CreateApiKeyPayload,
} from './types/user.types.js';

export type {
  ApiResponse,
  ApiError,
  HealthCheckResponse,
  ServiceHealth,
  ServiceHealthMap,
  AuthResponse,
  ProfileResponse,
  RegistrationResponse,
  PrincipalResponse,
  ApiKeySummary,
  GeneratedApiKeyResponse,
} from './types/api.types.js';
