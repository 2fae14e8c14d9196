/**
 * Authentication Service
 * Registration, email verification, login and password reset for
 * credential records.
 */

import crypto from 'crypto';
import type {
  AuthResponse,
  ProfileResponse,
  RegistrationResponse,
  User,
} from '@hamco/shared';
import { createLogger } from '../../infrastructure/logging/logger.js';
import type { UserRepository } from '../../infrastructure/repositories/user.repository.js';
import {
  ConflictError,
  ForbiddenError,
  UnauthorizedError,
  ValidationError,
} from '../errors.js';
import type { TransactionalEmailSender } from './email.sender.js';
import type { PasswordHasher } from './password.hasher.js';
import type { TokenService } from './jwt.service.js';
import { rolesFor } from './authorization.js';

const logger = createLogger('auth-service');

// 20 minutes
const ONE_TIME_TOKEN_TTL_MS = 20 * 60 * 1000;
const ONE_TIME_TOKEN_BYTES = 32;

export const FORGOT_PASSWORD_MESSAGE =
  'If an account with that email exists, a password reset link has been sent.';

export interface RegisterInput {
  readonly username: string;
  readonly email: string;
  readonly password: string;
}

export interface AuthServiceOptions {
  readonly allowRegistration: boolean;
  /** Origin used to build the links sent by email */
  readonly baseUrl: string;
}

export interface AuthServiceDeps {
  readonly users: UserRepository;
  readonly hasher: PasswordHasher;
  readonly tokens: TokenService;
  readonly email: TransactionalEmailSender;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Single-use token: the plaintext goes out by email, only the digest is stored
 */
export function createOneTimeToken(now: number = Date.now()): { token: string; digest: string; expiresAt: Date } {
  const token = crypto.randomBytes(ONE_TIME_TOKEN_BYTES).toString('base64url');
  return { token, digest: digestOneTimeToken(token), expiresAt: new Date(now + ONE_TIME_TOKEN_TTL_MS) };
}

export function digestOneTimeToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

export class AuthService {
  private readonly deps: AuthServiceDeps;
  private readonly options: AuthServiceOptions;

  constructor(deps: AuthServiceDeps, options: AuthServiceOptions) {
    this.deps = deps;
    this.options = options;
  }

  async register(input: RegisterInput): Promise<RegistrationResponse> {
    if (!this.options.allowRegistration) {
      throw new ForbiddenError('Registration is disabled', 'REGISTRATION_DISABLED');
    }

    const email = normalizeEmail(input.email);
    const existing = await this.deps.users.findByEmail(email);

    if (existing?.isEmailVerified) {
      throw new ConflictError('An account with this email already exists', 'EMAIL_EXISTS');
    }

    const verification = createOneTimeToken();

    if (existing) {
      await this.deps.users.setEmailVerificationToken(existing.id, verification.digest, verification.expiresAt);
      logger.info({ userId: existing.id }, 'Verification re-issued for unverified account');
    } else {
      const user = await this.deps.users.create({
        username: input.username.trim(),
        email,
        passwordHash: await this.deps.hasher.hash(input.password),
        emailVerificationTokenHash: verification.digest,
        emailVerificationTokenExpiresAt: verification.expiresAt,
      });
      logger.info({ userId: user.id, isAdmin: user.isAdmin }, 'User registered');
    }

    await this.deps.email.sendVerificationEmail(email, this.link('/api/auth/verify-email', verification.token));

    return {
      message: 'Registration successful. Please check your email to verify your account.',
      requiresEmailVerification: true,
      email,
    };
  }

  async verifyEmail(token: string): Promise<void> {
    const user = token
      ? await this.deps.users.findByEmailVerificationToken(digestOneTimeToken(token), new Date())
      : null;
    if (!user) {
      throw new ValidationError('Invalid or expired verification token', 'INVALID_TOKEN');
    }
    await this.deps.users.markEmailVerified(user.id);
    logger.info({ userId: user.id }, 'Email verified');
  }

  async login(emailInput: string, password: string): Promise<AuthResponse> {
    const user = await this.deps.users.findByEmail(normalizeEmail(emailInput));

    if (!user || !(await this.deps.hasher.verify(password, user.passwordHash))) {
      logger.warn({ reason: user ? 'password_mismatch' : 'unknown_email' }, 'Login failed');
      throw new UnauthorizedError('Invalid email or password', 'INVALID_CREDENTIALS');
    }

    if (!user.isEmailVerified) {
      throw new ForbiddenError('Please verify your email before logging in', 'EMAIL_NOT_VERIFIED');
    }

    const issued = this.deps.tokens.issue(user);
    logger.info({ userId: user.id, tokenId: issued.tokenId }, 'User logged in');

    return {
      token: issued.token,
      userId: user.id,
      email: user.email,
      roles: rolesFor(user.isAdmin),
      expiresAt: issued.expiresAt.toISOString(),
    };
  }

  /**
   * Same outcome whether or not the email is registered
   */
  async forgotPassword(emailInput: string): Promise<string> {
    const email = normalizeEmail(emailInput);
    const user = await this.deps.users.findByEmail(email);

    if (user) {
      const reset = createOneTimeToken();
      await this.deps.users.setPasswordResetToken(user.id, reset.digest, reset.expiresAt);
      await this.deps.email.sendPasswordResetEmail(email, this.link('/reset-password', reset.token));
      logger.info({ userId: user.id }, 'Password reset requested');
    } else {
      logger.debug('Password reset requested for unknown email');
    }

    return FORGOT_PASSWORD_MESSAGE;
  }

  async resetPassword(token: string, newPassword: string): Promise<void> {
    const user = token
      ? await this.deps.users.findByPasswordResetToken(digestOneTimeToken(token), new Date())
      : null;
    if (!user) {
      throw new ValidationError('Invalid or expired reset token', 'INVALID_TOKEN');
    }
    await this.deps.users.updatePassword(user.id, await this.deps.hasher.hash(newPassword));
    logger.info({ userId: user.id }, 'Password reset');
  }

  async getProfile(userId: string): Promise<ProfileResponse> {
    const user = await this.deps.users.findById(userId);
    if (!user) {
      throw new UnauthorizedError('User not found', 'USER_NOT_FOUND');
    }
    return toProfile(user);
  }

  private link(path: string, token: string): string {
    const url = new URL(path, this.options.baseUrl);
    url.searchParams.set('token', token);
    return url.toString();
  }
}

function toProfile(user: User): ProfileResponse {
  return {
    userId: user.id,
    username: user.username,
    email: user.email,
    roles: rolesFor(user.isAdmin),
    isEmailVerified: user.isEmailVerified,
    createdAt: user.createdAt.toISOString(),
  };
}
