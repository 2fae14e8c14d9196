/**
 * JWT Service
 * Issues and validates HS256 access tokens. Validation is pure computation
 * over the token and the configured secret: no storage is consulted.
 */

import crypto from 'crypto';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { TokenPrincipal } from '@hamco/shared';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { MIN_JWT_SECRET_LENGTH } from '../../config/index.js';
import { rolesFor } from './authorization.js';

const logger = createLogger('jwt-service');

const ALGORITHM = 'HS256';

export interface TokenServiceOptions {
  readonly secret: string;
  readonly issuer: string;
  readonly audience: string;
  readonly lifetimeMinutes: number;
}

/** The parts of a credential record a token is issued for */
export interface TokenSubject {
  readonly id: string;
  readonly email: string;
  readonly isAdmin: boolean;
}

export interface IssuedToken {
  readonly token: string;
  readonly tokenId: string;
  readonly expiresAt: Date;
}

const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  jti: z.string().min(1),
  roles: z.array(z.enum(['Admin', 'User'])),
  exp: z.number().int(),
});

export class TokenService {
  private readonly options: TokenServiceOptions;

  constructor(options: TokenServiceOptions) {
    if (!options.secret || options.secret.length < MIN_JWT_SECRET_LENGTH) {
      throw new Error(`JWT secret must be at least ${MIN_JWT_SECRET_LENGTH} characters long`);
    }
    if (!options.issuer.trim() || !options.audience.trim()) {
      throw new Error('JWT issuer and audience are required');
    }
    if (options.lifetimeMinutes <= 0) {
      throw new Error('JWT lifetime must be positive');
    }
    this.options = options;
  }

  issue(subject: TokenSubject): IssuedToken {
    const tokenId = crypto.randomUUID();
    const token = jwt.sign(
      {
        email: subject.email,
        roles: rolesFor(subject.isAdmin),
      },
      this.options.secret,
      {
        algorithm: ALGORITHM,
        subject: subject.id,
        jwtid: tokenId,
        issuer: this.options.issuer,
        audience: this.options.audience,
        expiresIn: this.options.lifetimeMinutes * 60,
      }
    );

    const decoded = jwt.decode(token);
    const exp = decoded !== null && typeof decoded === 'object' ? decoded.exp : undefined;
    const expiresAt = new Date((exp ?? Math.floor(Date.now() / 1000) + this.options.lifetimeMinutes * 60) * 1000);

    return { token, tokenId, expiresAt };
  }

  /**
   * Signature, expiry, issuer and audience must all hold. Any failure yields
   * null; the reason is only logged.
   */
  validate(token: string): TokenPrincipal | null {
    if (!token) {
      return null;
    }

    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [ALGORITHM],
        issuer: this.options.issuer,
        audience: this.options.audience,
      });
    } catch (error) {
      logger.debug({ reason: error instanceof Error ? error.name : 'unknown' }, 'JWT rejected');
      return null;
    }

    const parsed = TokenClaimsSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.debug('JWT claims malformed');
      return null;
    }

    const claims = parsed.data;
    return {
      method: 'token',
      subjectId: claims.sub,
      label: claims.email,
      roles: claims.roles,
      tokenId: claims.jti,
      expiresAt: new Date(claims.exp * 1000),
    };
  }
}

/**
 * Extract token from Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  // Scheme names are case-insensitive
  const match = /^bearer\s+(.*)$/i.exec(authHeader ?? '');
  const token = match?.[1]?.trim();
  return token || null;
}
