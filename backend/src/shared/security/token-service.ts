/**
 * src/shared/security/token-service.ts
 *
 * WHY:
 * - Mints and verifies the signed access/refresh pair (HS256 via jsonwebtoken).
 * - Stateless claims on the hot path; forced invalidation comes from the
 *   revocation list keyed by `sid`. Both tiers are required.
 *
 * RULES:
 * - Access and refresh tokens use DISTINCT secrets (constructor enforces it).
 * - validate() pins the algorithm, issuer and audience, then checks `typ`:
 *   an access token never validates as a refresh token and vice versa.
 * - Failures throw TokenValidationError ('expired' | 'invalid'); callers map them
 *   to SecurityErrors. No partial trust in a token that failed any check.
 * - A fresh session id is minted per issuance and embedded in both tokens.
 */

import { randomUUID } from 'node:crypto';
import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

export type TokenType = 'access' | 'refresh';

const ALGORITHM = 'HS256';

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  roles: z.array(z.string()),
  permissions: z.array(z.string()),
  sid: z.string().uuid(),
  typ: z.enum(['access', 'refresh']),
  iat: z.number().int(),
  nbf: z.number().int(),
  exp: z.number().int(),
  iss: z.string(),
  aud: z.string(),
  jti: z.string().min(1),
});

export type TokenClaims = z.infer<typeof ClaimsSchema>;

export type TokenSubject = {
  identityId: string;
  email: string;
  roles: readonly string[];
  permissions: readonly string[];
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  /** Access token expiry. */
  expiresAt: Date;
  refreshExpiresAt: Date;
  sessionId: string;
  issuedAt: Date;
};

export type TokenServiceOptions = {
  accessSecret: string;
  refreshSecret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  issuer: string;
  audience: string;
  clockToleranceSeconds: number;
  /** Milliseconds since epoch; injectable for tests. */
  clock?: () => number;
};

export class TokenValidationError extends Error {
  constructor(public readonly reason: 'expired' | 'invalid') {
    super(`Token ${reason}`);
    this.name = 'TokenValidationError';
  }
}

export class TokenService {
  private readonly clock: () => number;

  constructor(private readonly opts: TokenServiceOptions) {
    if (opts.accessSecret === opts.refreshSecret) {
      throw new Error('TokenService: access and refresh secrets must differ.');
    }
    this.clock = opts.clock ?? Date.now;
  }

  get refreshTtlSeconds(): number {
    return this.opts.refreshTtlSeconds;
  }

  /** Refresh expiry (seconds) for a pair issued at `issuedAtSeconds`. */
  refreshExpiryFor(issuedAtSeconds: number): number {
    return issuedAtSeconds + this.opts.refreshTtlSeconds;
  }

  issuePair(subject: TokenSubject): TokenPair {
    const now = Math.floor(this.clock() / 1000);
    const sessionId = randomUUID();

    const accessExp = now + this.opts.accessTtlSeconds;
    const refreshExp = now + this.opts.refreshTtlSeconds;

    const accessToken = this.sign('access', {
      sub: subject.identityId,
      email: subject.email,
      roles: [...subject.roles],
      permissions: [...subject.permissions],
      sid: sessionId,
      typ: 'access',
      iat: now,
      nbf: now,
      exp: accessExp,
      iss: this.opts.issuer,
      aud: this.opts.audience,
      jti: randomUUID(),
    });

    // Refresh carries no authorization claims; they are re-resolved on rotation.
    const refreshToken = this.sign('refresh', {
      sub: subject.identityId,
      email: subject.email,
      roles: [],
      permissions: [],
      sid: sessionId,
      typ: 'refresh',
      iat: now,
      nbf: now,
      exp: refreshExp,
      iss: this.opts.issuer,
      aud: this.opts.audience,
      jti: randomUUID(),
    });

    return {
      accessToken,
      refreshToken,
      tokenType: 'Bearer',
      expiresAt: new Date(accessExp * 1000),
      refreshExpiresAt: new Date(refreshExp * 1000),
      sessionId,
      issuedAt: new Date(now * 1000),
    };
  }

  validate(token: string, expectedType: TokenType): TokenClaims {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secretFor(expectedType), {
        algorithms: [ALGORITHM],
        issuer: this.opts.issuer,
        audience: this.opts.audience,
        clockTolerance: this.opts.clockToleranceSeconds,
        clockTimestamp: Math.floor(this.clock() / 1000),
      });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) throw new TokenValidationError('expired');
      throw new TokenValidationError('invalid');
    }

    const parsed = ClaimsSchema.safeParse(decoded);
    if (!parsed.success) throw new TokenValidationError('invalid');

    if (parsed.data.typ !== expectedType) throw new TokenValidationError('invalid');

    return parsed.data;
  }

  private secretFor(type: TokenType): string {
    return type === 'access' ? this.opts.accessSecret : this.opts.refreshSecret;
  }

  private sign(type: TokenType, claims: TokenClaims): string {
    return jwt.sign(claims, this.secretFor(type), { algorithm: ALGORITHM });
  }
}
