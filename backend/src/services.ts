/**
 * Service composition
 * Builds the auth core from configuration and storage collaborators.
 * Nothing here opens a connection.
 */

import type { Config } from './config/index.js';
import { ApiKeyCodec } from './application/auth/apikey.codec.js';
import {
  CachedApiKeyResolver,
  MemoryKeyCacheStore,
  noopInvalidator,
  type ApiKeyCacheInvalidator,
  type KeyCacheStore,
} from './application/auth/apikey-cache.service.js';
import { StoreApiKeyResolver, type ApiKeyResolver } from './application/auth/apikey.resolver.js';
import { ApiKeyService } from './application/auth/apikey.service.js';
import { AuthService } from './application/auth/auth.service.js';
import { LoggingEmailSender, type TransactionalEmailSender } from './application/auth/email.sender.js';
import { TokenService } from './application/auth/jwt.service.js';
import { BcryptPasswordHasher, type PasswordHasher } from './application/auth/password.hasher.js';
import type { ApiKeyRepository } from './infrastructure/repositories/apikey.repository.js';
import type { UserRepository } from './infrastructure/repositories/user.repository.js';
import {
  apiKeyStep,
  bearerTokenStep,
  type AuthenticationStep,
} from './infrastructure/http/middleware/auth.middleware.js';

/** Connectivity checks behind the health routes; null means not in use */
export interface HealthProbes {
  readonly postgres: () => Promise<void>;
  readonly redis: (() => Promise<void>) | null;
}

export interface ServiceDeps {
  readonly users: UserRepository;
  readonly apiKeys: ApiKeyRepository;
  readonly health: HealthProbes;
  /** Defaults to a per-process store when the cache is enabled */
  readonly cacheStore?: KeyCacheStore;
  readonly email?: TransactionalEmailSender;
  readonly hasher?: PasswordHasher;
}

export interface Services {
  readonly auth: AuthService;
  readonly apiKeys: ApiKeyService;
  readonly tokens: TokenService;
  readonly apiKeyResolver: ApiKeyResolver;
  readonly authenticationSteps: readonly AuthenticationStep[];
  readonly health: HealthProbes;
}

export function createServices(config: Config, deps: ServiceDeps): Services {
  const hasher = deps.hasher ?? new BcryptPasswordHasher(config.auth.bcryptRounds);
  const codec = new ApiKeyCodec(config.apiKeys.prefix, hasher);
  const tokens = new TokenService({
    secret: config.auth.jwtSecret,
    issuer: config.auth.jwtIssuer,
    audience: config.auth.jwtAudience,
    lifetimeMinutes: config.auth.jwtExpiresInMinutes,
  });

  const storeResolver = new StoreApiKeyResolver(deps.apiKeys, codec);
  let apiKeyResolver: ApiKeyResolver = storeResolver;
  let invalidator: ApiKeyCacheInvalidator = noopInvalidator;

  if (config.apiKeys.cacheTtlSeconds > 0) {
    const cached = new CachedApiKeyResolver(
      storeResolver,
      deps.cacheStore ?? new MemoryKeyCacheStore(),
      codec,
      config.apiKeys.cacheTtlSeconds
    );
    apiKeyResolver = cached;
    invalidator = cached;
  }

  const auth = new AuthService(
    { users: deps.users, hasher, tokens, email: deps.email ?? new LoggingEmailSender() },
    { allowRegistration: config.registration.allowRegistration, baseUrl: config.server.baseUrl }
  );

  return {
    auth,
    apiKeys: new ApiKeyService(deps.apiKeys, codec, invalidator),
    tokens,
    apiKeyResolver,
    authenticationSteps: [bearerTokenStep(tokens), apiKeyStep(apiKeyResolver)],
    health: deps.health,
  };
}
