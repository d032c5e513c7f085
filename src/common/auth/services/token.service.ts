/**
 * Dental Clinic API - Token Service
 *
 * Issues and verifies HS256 bearer tokens. Access tokens are short-lived;
 * refresh tokens carry a `jti` so they can be revoked on logout.
 */

import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as jwt from 'jsonwebtoken';
import { randomUUID } from 'crypto';
import { UserRole } from '../../types/roles';

export type TokenType = 'access' | 'refresh';

export interface TokenSubject {
  id: number;
  role: UserRole;
  clinicId: number | null;
}

export interface TokenClaims {
  sub: string;
  role: UserRole;
  clinicId: number | null;
  type: TokenType;
  jti: string;
  iat: number;
  exp: number;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

const ROLES: readonly string[] = Object.values(UserRole);

function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && ROLES.includes(value);
}

export function isTokenClaims(value: unknown): value is TokenClaims {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const claims: Record<string, unknown> = { ...value };
  return (
    typeof claims.sub === 'string' &&
    isUserRole(claims.role) &&
    (claims.clinicId === null || typeof claims.clinicId === 'number') &&
    (claims.type === 'access' || claims.type === 'refresh') &&
    typeof claims.jti === 'string' &&
    typeof claims.iat === 'number' &&
    typeof claims.exp === 'number'
  );
}

@Injectable()
export class TokenService {
  private readonly secret: string;
  private readonly accessLifetimeMinutes: number;
  private readonly refreshLifetimeDays: number;

  constructor(config: ConfigService) {
    this.secret = config.getOrThrow<string>('jwt.secret');
    this.accessLifetimeMinutes = config.get<number>('jwt.accessTokenLifetimeMinutes', 15);
    this.refreshLifetimeDays = config.get<number>('jwt.refreshTokenLifetimeDays', 7);
  }

  issuePair(subject: TokenSubject): TokenPair {
    return {
      access: this.issue(subject, 'access'),
      refresh: this.issue(subject, 'refresh'),
    };
  }

  issue(subject: TokenSubject, type: TokenType): string {
    const expiresIn = type === 'access' ? `${this.accessLifetimeMinutes}m` : `${this.refreshLifetimeDays}d`;
    return jwt.sign(
      {
        sub: String(subject.id),
        role: subject.role,
        clinicId: subject.clinicId,
        type,
        jti: randomUUID(),
      },
      this.secret,
      { algorithm: 'HS256', expiresIn },
    );
  }

  /**
   * Verifies signature, expiry and token type.
   *
   * @throws UnauthorizedException with code `token_not_valid`
   */
  verify(token: string, expectedType: TokenType): TokenClaims {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: ['HS256'] });
    } catch (error) {
      const reason = error instanceof jwt.TokenExpiredError ? 'Token is expired.' : 'Token is invalid.';
      throw new UnauthorizedException({ code: 'token_not_valid', message: reason });
    }

    if (!isTokenClaims(decoded) || decoded.type !== expectedType) {
      throw new UnauthorizedException({
        code: 'token_not_valid',
        message: `Token has wrong type. Expected ${expectedType} token.`,
      });
    }
    return decoded;
  }

  userIdOf(claims: TokenClaims): number {
    const id = Number(claims.sub);
    if (!Number.isInteger(id) || id <= 0) {
      throw new UnauthorizedException({ code: 'token_not_valid', message: 'Token contained no recognizable user identification.' });
    }
    return id;
  }
}
