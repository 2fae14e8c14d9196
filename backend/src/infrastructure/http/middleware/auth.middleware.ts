/**
 * Authentication Middleware
 * An ordered list of steps, tried until one authenticates or refuses.
 *
 * Token first: validation is pure computation. The API key step needs a
 * storage lookup and a bcrypt comparison, so it only runs when no valid
 * token was presented.
 */

import type { FastifyReply, FastifyRequest, onRequestAsyncHookHandler } from 'fastify';
import type { Principal, Role } from '@hamco/shared';
import type { ApiKeyResolver } from '../../../application/auth/apikey.resolver.js';
import { requires } from '../../../application/auth/authorization.js';
import { extractBearerToken, type TokenService } from '../../../application/auth/jwt.service.js';
import {
  ForbiddenError,
  ServiceUnavailableError,
  UnauthorizedError,
  errorMessage,
  type AppError,
} from '../../../application/errors.js';
import { createLogger, maskSecret } from '../../logging/logger.js';

const logger = createLogger('auth-middleware');

export const AUTH_COOKIE_NAME = 'AuthToken';
export const API_KEY_HEADER = 'x-api-key';

declare module 'fastify' {
  interface FastifyRequest {
    principal?: Principal;
  }
}

/** Credential material pulled off a request, before any validation */
export interface PresentedCredentials {
  readonly bearerToken: string | null;
  /** undefined when the header is absent; '' when present but empty */
  readonly apiKey: string | undefined;
}

export type StepOutcome =
  | { readonly kind: 'authenticated'; readonly principal: Principal }
  | { readonly kind: 'skipped' }
  | { readonly kind: 'rejected'; readonly reason: string }
  | { readonly kind: 'unavailable'; readonly error: unknown };

export interface AuthenticationStep {
  readonly name: string;
  attempt(credentials: PresentedCredentials): Promise<StepOutcome>;
}

export type ChainResult =
  | { readonly kind: 'authenticated'; readonly principal: Principal; readonly step: string }
  | { readonly kind: 'anonymous' }
  | { readonly kind: 'rejected'; readonly reason: string; readonly step: string }
  | { readonly kind: 'unavailable'; readonly step: string };

const SKIPPED: StepOutcome = { kind: 'skipped' };

/**
 * An invalid token is not fatal: a later step may still authenticate.
 */
export function bearerTokenStep(tokens: TokenService): AuthenticationStep {
  return {
    name: 'bearer-token',
    async attempt(credentials) {
      if (!credentials.bearerToken) {
        return SKIPPED;
      }
      const principal = tokens.validate(credentials.bearerToken);
      return principal ? { kind: 'authenticated', principal } : SKIPPED;
    },
  };
}

/**
 * A presented key must authenticate; it never degrades to anonymous.
 */
export function apiKeyStep(resolver: ApiKeyResolver): AuthenticationStep {
  return {
    name: 'api-key',
    async attempt(credentials) {
      const secret = credentials.apiKey;
      if (secret === undefined) {
        return SKIPPED;
      }
      if (secret === '') {
        return { kind: 'rejected', reason: 'empty_api_key' };
      }
      try {
        const principal = await resolver.resolve(secret);
        return principal ? { kind: 'authenticated', principal } : { kind: 'rejected', reason: 'invalid_api_key' };
      } catch (error) {
        logger.error({ error: errorMessage(error), prefix: maskSecret(secret) }, 'API key resolution failed');
        return { kind: 'unavailable', error };
      }
    },
  };
}

export async function runAuthenticationChain(
  steps: readonly AuthenticationStep[],
  credentials: PresentedCredentials
): Promise<ChainResult> {
  for (const step of steps) {
    const outcome = await step.attempt(credentials);
    switch (outcome.kind) {
      case 'authenticated':
        return { kind: 'authenticated', principal: outcome.principal, step: step.name };
      case 'rejected':
        return { kind: 'rejected', reason: outcome.reason, step: step.name };
      case 'unavailable':
        return { kind: 'unavailable', step: step.name };
      case 'skipped':
        break;
    }
  }
  return { kind: 'anonymous' };
}

export function extractCredentials(request: FastifyRequest): PresentedCredentials {
  const header = request.headers[API_KEY_HEADER];
  // Repeated headers are ambiguous; treated like an empty one
  const apiKey = Array.isArray(header) ? '' : header;

  return {
    bearerToken: extractBearerToken(request.headers.authorization) ?? request.cookies[AUTH_COOKIE_NAME] ?? null,
    apiKey,
  };
}

function sendError(reply: FastifyReply, error: AppError): FastifyReply {
  return reply.status(error.statusCode).send({
    success: false,
    error: { code: error.code, message: error.message },
  });
}

/**
 * Global onRequest hook. Attaches `request.principal` or answers 401/503;
 * anonymous requests continue and are left to the route's own gate.
 */
export function createAuthenticationHook(steps: readonly AuthenticationStep[]): onRequestAsyncHookHandler {
  return async function authenticate(request, reply) {
    if (request.principal) {
      return;
    }

    const result = await runAuthenticationChain(steps, extractCredentials(request));

    switch (result.kind) {
      case 'authenticated':
        request.principal = result.principal;
        return;
      case 'anonymous':
        return;
      case 'rejected':
        logger.debug({ step: result.step, reason: result.reason, requestId: request.id }, 'Authentication failed');
        return sendError(reply, new UnauthorizedError());
      case 'unavailable':
        return sendError(reply, new ServiceUnavailableError('Authentication is temporarily unavailable'));
    }
  };
}

export async function requireAuthentication(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | undefined> {
  if (!request.principal) {
    return sendError(reply, new UnauthorizedError('Authentication required'));
  }
  return undefined;
}

/**
 * Require specific role
 */
export function requireRole(role: Role) {
  return async function (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    const decision = requires(request.principal, role);
    if (decision.allowed) {
      return undefined;
    }

    if (decision.reason === 'unauthenticated') {
      return sendError(reply, new UnauthorizedError('Authentication required'));
    }

    logger.warn({ subjectId: request.principal?.subjectId, requiredRole: role }, 'Insufficient permissions');
    return sendError(reply, new ForbiddenError());
  };
}
