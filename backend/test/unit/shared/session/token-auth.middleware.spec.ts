import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { registerAuthContext, type AuthContext } from '../../../../src/shared/http/auth-context';
import { registerErrorHandler } from '../../../../src/shared/http/error-handler';
import { registerRequestContext } from '../../../../src/shared/http/request-context';
import { TokenService } from '../../../../src/shared/security/token-service';
import { RevocationList } from '../../../../src/shared/session/revocation-list';
import {
  extractBearerToken,
  registerTokenAuthentication,
  type ResolvedAccess,
} from '../../../../src/shared/session/token-auth.middleware';
import { UnavailableCache } from '../../../helpers/in-memory-stores';
import { createTestClock, type TestClock } from '../../../helpers/test-clock';

const subject = {
  identityId: '9d3a5e1f-0b7c-4e22-8a6d-3c5b7e9f1a23',
  email: 'sam@example.com',
  roles: ['employee'],
  permissions: ['stale.claim'],
};

describe('extractBearerToken', () => {
  const cases: Array<[string | undefined, string | null | undefined]> = [
    [undefined, undefined],
    ['Bearer abc.def.ghi', 'abc.def.ghi'],
    ['bearer   abc', 'abc'],
    ['Bearer', null],
    ['Bearer a b', null],
    ['Basic dXNlcjpwYXNz', null],
  ];

  it.each(cases)('%s -> %s', (header, expected) => {
    expect(extractBearerToken(header)).toBe(expected);
  });
});

describe('registerTokenAuthentication', () => {
  let clock: TestClock;
  let cache: InMemCache;
  let tokens: TokenService;
  let resolveCalls: string[];
  let app: FastifyInstance;

  function build(revocationList: RevocationList): FastifyInstance {
    const instance = Fastify({ logger: false });
    registerRequestContext(instance);
    registerAuthContext(instance);
    registerErrorHandler(instance);
    registerTokenAuthentication(instance, {
      tokenService: tokens,
      revocationList,
      resolveAccess: (identityId): Promise<ResolvedAccess> => {
        resolveCalls.push(identityId);
        return Promise.resolve({ roles: ['employee'], permissions: ['profile.view'] });
      },
    });
    instance.get('/ctx', async (req) => req.authContext);
    return instance;
  }

  async function contextFor(authorization?: string): Promise<AuthContext> {
    const res = await app.inject({
      method: 'GET',
      url: '/ctx',
      headers: authorization === undefined ? {} : { authorization },
    });
    expect(res.statusCode).toBe(200);
    return res.json<AuthContext>();
  }

  beforeEach(() => {
    clock = createTestClock();
    cache = new InMemCache({ now: clock.now });
    tokens = new TokenService({
      accessSecret: 'test-access-secret-0123456789abcdef',
      refreshSecret: 'test-refresh-secret-0123456789abcdef',
      accessTtlSeconds: 900,
      refreshTtlSeconds: 604800,
      issuer: 'hr-management-system',
      audience: 'hr-management-users',
      clockToleranceSeconds: 5,
      clock: clock.now,
    });
    resolveCalls = [];
    app = build(new RevocationList(cache));
  });

  afterEach(async () => {
    await app.close();
  });

  it('leaves the context empty without a header', async () => {
    expect(await contextFor()).toEqual({
      identityId: null,
      email: null,
      sessionId: null,
      roles: [],
      permissions: [],
      tokenIssuedAt: null,
      failure: null,
    });
  });

  it('records TOKEN_INVALID for a malformed header', async () => {
    expect((await contextFor('Basic dXNlcjpwYXNz')).failure).toBe('TOKEN_INVALID');
  });

  it('fills the context from a valid token and the resolved permission set', async () => {
    const pair = tokens.issuePair(subject);

    expect(await contextFor(`Bearer ${pair.accessToken}`)).toEqual({
      identityId: subject.identityId,
      email: 'sam@example.com',
      sessionId: pair.sessionId,
      roles: ['employee'],
      permissions: ['profile.view'],
      tokenIssuedAt: Math.floor(clock.now() / 1000),
      failure: null,
    });
    expect(resolveCalls).toEqual([subject.identityId]);
  });

  it('records TOKEN_EXPIRED and skips permission resolution', async () => {
    const pair = tokens.issuePair(subject);
    clock.advance(906);

    expect((await contextFor(`Bearer ${pair.accessToken}`)).failure).toBe('TOKEN_EXPIRED');
    expect(resolveCalls).toEqual([]);
  });

  it('refuses a refresh token presented as a bearer token', async () => {
    const pair = tokens.issuePair(subject);

    expect((await contextFor(`Bearer ${pair.refreshToken}`)).failure).toBe('TOKEN_INVALID');
  });

  it('records SESSION_REVOKED for a revoked session', async () => {
    const pair = tokens.issuePair(subject);
    await new RevocationList(cache).revoke(pair.sessionId, 60);

    const ctx = await contextFor(`Bearer ${pair.accessToken}`);
    expect(ctx.failure).toBe('SESSION_REVOKED');
    expect(ctx.identityId).toBeNull();
  });

  it('fails closed when the revocation list cannot be read', async () => {
    await app.close();
    app = build(new RevocationList(new UnavailableCache()));
    const pair = tokens.issuePair(subject);

    const res = await app.inject({
      method: 'GET',
      url: '/ctx',
      headers: { authorization: `Bearer ${pair.accessToken}` },
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: { code: 'INTERNAL', message: 'Internal server error' } });
  });
});
