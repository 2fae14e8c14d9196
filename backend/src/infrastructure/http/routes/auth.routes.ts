/**
 * Authentication Routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { PrincipalResponse } from '@hamco/shared';
import type { Config } from '../../../config/index.js';
import type { Services } from '../../../services.js';
import { ValidationError } from '../../../application/errors.js';
import { AUTH_COOKIE_NAME, requireAuthentication } from '../middleware/auth.middleware.js';
import { parseRequest } from '../validation.js';
import { createLogger } from '../../logging/logger.js';

const logger = createLogger('auth-routes');

const AUTH_COOKIE_MAX_AGE_SECONDS = 60 * 60;

const BCRYPT_MAX_PASSWORD_BYTES = 72;

// bcrypt ignores everything past its 72nd byte
const PasswordSchema = z
  .string({ required_error: 'Password is required' })
  .min(8, 'Password must be at least 8 characters')
  .refine(
    password => Buffer.byteLength(password, 'utf8') <= BCRYPT_MAX_PASSWORD_BYTES,
    `Password must be at most ${BCRYPT_MAX_PASSWORD_BYTES} bytes`
  );

const EmailSchema = z.string({ required_error: 'Email is required' }).trim().email('Invalid email format');

const RegisterSchema = z.object({
  username: z
    .string({ required_error: 'Username is required' })
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(50, 'Username must be at most 50 characters'),
  email: EmailSchema,
  password: PasswordSchema,
});

const LoginSchema = z.object({
  email: EmailSchema,
  password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
});

const ForgotPasswordSchema = z.object({
  email: EmailSchema,
});

const ResetPasswordSchema = z.object({
  token: z.string({ required_error: 'Token is required' }).min(1, 'Token is required'),
  newPassword: PasswordSchema,
});

const TokenQuerySchema = z.object({
  token: z.string({ required_error: 'Token is required' }).min(1, 'Token is required'),
});

const CookieSchema = z.object({
  token: z.string().optional(),
});

export interface AuthRoutesOptions {
  readonly config: Config;
  readonly services: Services;
}

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (
  fastify: FastifyInstance,
  { config, services }
): Promise<void> => {
  // Credential-guessing endpoints get a tighter limit than the global one
  const strictRateLimit = {
    rateLimit: { max: config.auth.rateLimitMax, timeWindow: '1 minute' },
  };

  // POST /auth/register
  fastify.post('/register', {
    config: strictRateLimit,
    schema: {
      tags: ['Auth'],
      summary: 'Register an account',
      description: 'Creates an unverified account and sends a verification link. The first account becomes an administrator.',
    },
  }, async (request, reply) => {
    const body = parseRequest(RegisterSchema, request.body);
    const result = await services.auth.register(body);
    return reply.status(200).send({ success: true, data: result });
  });

  // GET /auth/verify-email?token=
  fastify.get('/verify-email', {
    schema: {
      tags: ['Auth'],
      summary: 'Verify email address',
    },
  }, async (request, reply) => {
    const { token } = parseRequest(TokenQuerySchema, request.query);
    await services.auth.verifyEmail(token);
    return reply.send({ success: true, data: { message: 'Email verified successfully. You can now log in.' } });
  });

  // POST /auth/login
  fastify.post('/login', {
    config: strictRateLimit,
    schema: {
      tags: ['Auth'],
      summary: 'Log in and get a JWT',
    },
  }, async (request, reply) => {
    const body = parseRequest(LoginSchema, request.body);
    const result = await services.auth.login(body.email, body.password);
    return reply.send({ success: true, data: result });
  });

  // POST /auth/forgot-password
  fastify.post('/forgot-password', {
    config: strictRateLimit,
    schema: {
      tags: ['Auth'],
      summary: 'Request a password reset link',
    },
  }, async (request, reply) => {
    const body = parseRequest(ForgotPasswordSchema, request.body);
    const message = await services.auth.forgotPassword(body.email);
    return reply.send({ success: true, data: { message } });
  });

  // POST /auth/reset-password
  fastify.post('/reset-password', {
    config: strictRateLimit,
    schema: {
      tags: ['Auth'],
      summary: 'Set a new password with a reset token',
    },
  }, async (request, reply) => {
    const body = parseRequest(ResetPasswordSchema, request.body);
    await services.auth.resetPassword(body.token, body.newPassword);
    return reply.send({ success: true, data: { message: 'Password has been reset successfully.' } });
  });

  // GET /auth/profile
  fastify.get('/profile', {
    schema: {
      tags: ['Auth'],
      summary: 'Get the current user profile',
      security: [{ bearerAuth: [] }],
    },
    preHandler: requireAuthentication,
  }, async (request, reply) => {
    const subjectId = request.principal?.subjectId ?? '';
    const profile = await services.auth.getProfile(subjectId);
    return reply.send({ success: true, data: profile });
  });

  // GET /auth/me
  fastify.get('/me', {
    schema: {
      tags: ['Auth'],
      summary: 'Get current principal',
      security: [{ bearerAuth: [] }, { apiKey: [] }],
    },
    preHandler: requireAuthentication,
  }, async (request, reply) => {
    const principal = request.principal;
    if (!principal) {
      return reply.status(401).send({
        success: false,
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
    }
    const data: PrincipalResponse = {
      subjectId: principal.subjectId,
      label: principal.label,
      roles: principal.roles,
      method: principal.method,
    };
    return reply.send({ success: true, data });
  });

  // POST /auth/cookie
  fastify.post('/cookie', {
    schema: {
      tags: ['Auth'],
      summary: 'Store a JWT in the AuthToken cookie',
    },
  }, async (request, reply) => {
    const { token } = parseRequest(CookieSchema, request.body ?? {});
    if (!token?.trim()) {
      throw new ValidationError('Token is required');
    }
    logger.debug('Auth cookie set');
    return reply
      .setCookie(AUTH_COOKIE_NAME, token, {
        httpOnly: true,
        secure: config.env !== 'development',
        sameSite: 'strict',
        path: '/',
        maxAge: AUTH_COOKIE_MAX_AGE_SECONDS,
      })
      .send({ success: true, data: { message: 'Cookie set' } });
  });

  // GET /auth/logout
  fastify.get('/logout', {
    schema: {
      tags: ['Auth'],
      summary: 'Clear the AuthToken cookie',
    },
  }, async (_request, reply) => {
    return reply
      .clearCookie(AUTH_COOKIE_NAME, { path: '/' })
      .send({ success: true, data: { message: 'Logged out' } });
  });
};
