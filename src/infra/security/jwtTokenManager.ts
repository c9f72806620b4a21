import jwt, { type Algorithm } from 'jsonwebtoken';
import { z } from 'zod';
import { UnauthorizedError } from '../../application/errors.js';
import type { AccessTokenClaims, TokenManager } from '../../domain/auth/ports.js';
import { ROLES } from '../../domain/auth/user.js';

const claimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
});

export interface JwtTokenManagerOptions {
  secret: string;
  algorithm?: Algorithm;
  expiresInMinutes?: number;
}

export class JwtTokenManager implements TokenManager {
  private readonly secret: string;
  private readonly algorithm: Algorithm;
  private readonly defaultTtlSeconds: number;

  constructor(options: JwtTokenManagerOptions) {
    this.secret = options.secret;
    this.algorithm = options.algorithm ?? 'HS256';
    this.defaultTtlSeconds = (options.expiresInMinutes ?? 30) * 60;
  }

  createAccessToken(claims: AccessTokenClaims, ttlSeconds?: number): string {
    return jwt.sign({ sub: claims.sub, role: claims.role }, this.secret, {
      algorithm: this.algorithm,
      expiresIn: ttlSeconds ?? this.defaultTtlSeconds,
    });
  }

  decodeToken(token: string): AccessTokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: [this.algorithm] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError('Token has expired');
      }
      throw new UnauthorizedError('Could not validate credentials');
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new UnauthorizedError('Could not validate credentials');
    }
    return claims.data;
  }
}
