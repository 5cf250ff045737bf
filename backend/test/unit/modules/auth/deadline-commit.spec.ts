import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ClientInfo } from '../../../../src/shared/http/client-info';
import type { CurrentIdentity } from '../../../../src/shared/http/require-auth-context';
import { buildTestApp, type TestApp } from '../../../helpers/build-test-app';
import { signIn } from '../../../helpers/auth-requests';

const PASSWORD = 'Payroll-2030!';

const client: ClientInfo = {
  ip: '10.1.2.3',
  userAgent: 'vitest',
  acceptLanguage: null,
  requestId: 'req-deadline',
};

function expired(): AbortSignal {
  return AbortSignal.abort(new Error('deadline passed'));
}

describe('flows past their deadline commit nothing', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
    await t.seedIdentity({ email: 'quinn@example.com', password: PASSWORD });
  });

  afterEach(async () => {
    await t.close();
  });

  it('login stores no session', async () => {
    await expect(
      t.deps.auth.authService.login({ email: 'quinn@example.com', password: PASSWORD, client }, expired()),
    ).rejects.toThrow('deadline passed');

    expect(t.stores.sessions.sessions.size).toBe(0);
  });

  it('refresh leaves the previous session usable', async () => {
    const login = await signIn(t, 'quinn@example.com', PASSWORD);

    await expect(
      t.deps.auth.authService.refresh({ refreshToken: login.tokens.refreshToken, client }, expired()),
    ).rejects.toThrow('deadline passed');

    expect(await t.deps.revocationList.isRevoked(login.tokens.sessionId)).toBe(false);
    expect(t.stores.sessions.sessions.size).toBe(1);
  });

  it('login discards a session whose insert outlived the deadline', async () => {
    const registry = t.deps.sessions.sessionRegistry;
    const store = registry.storeSession.bind(registry);
    const controller = new AbortController();
    vi.spyOn(registry, 'storeSession').mockImplementation(async (identityId, pair, sessionClient) => {
      const record = await store(identityId, pair, sessionClient);
      controller.abort(new Error('deadline passed'));
      return record;
    });

    await expect(
      t.deps.auth.authService.login(
        { email: 'quinn@example.com', password: PASSWORD, client },
        controller.signal,
      ),
    ).rejects.toThrow('deadline passed');

    expect(t.stores.sessions.sessions.size).toBe(0);
  });

  it('login sends no two-factor code', async () => {
    const second = await t.seedIdentity({
      email: 'sky@example.com',
      password: PASSWORD,
      twoFactorEnabled: true,
    });

    await expect(
      t.deps.auth.authService.login({ email: 'sky@example.com', password: PASSWORD, client }, expired()),
    ).rejects.toThrow('deadline passed');

    expect(t.queue.drain()).toEqual([]);
    expect(await t.cache.get(`otp:two_factor:${second.id}`)).toBeNull();
  });

  it('refresh rolls back when the deadline fires during the revoke', async () => {
    const login = await signIn(t, 'quinn@example.com', PASSWORD);
    const registry = t.deps.sessions.sessionRegistry;
    const revoke = registry.revoke.bind(registry);
    const controller = new AbortController();
    vi.spyOn(registry, 'revoke').mockImplementation(async (sessionId, refreshExpiresAt) => {
      const won = await revoke(sessionId, refreshExpiresAt);
      controller.abort(new Error('deadline passed'));
      return won;
    });

    await expect(
      t.deps.auth.authService.refresh(
        { refreshToken: login.tokens.refreshToken, client },
        controller.signal,
      ),
    ).rejects.toThrow('deadline passed');

    expect(await t.deps.revocationList.isRevoked(login.tokens.sessionId)).toBe(false);
    expect([...t.stores.sessions.sessions.keys()]).toEqual([login.tokens.sessionId]);
    expect(t.stores.sessions.sessions.get(login.tokens.sessionId)?.revokedAt).toBeNull();
  });

  it('logout leaves the session alive', async () => {
    const login = await signIn(t, 'quinn@example.com', PASSWORD);
    const identity: CurrentIdentity = {
      id: login.identity.id,
      email: login.identity.email,
      sessionId: login.tokens.sessionId,
      roles: [],
      permissions: [],
      tokenIssuedAt: Math.floor(t.clock.now() / 1000),
    };

    await expect(t.deps.auth.authService.logout({ identity, client }, expired())).rejects.toThrow(
      'deadline passed',
    );

    expect(await t.deps.revocationList.isRevoked(login.tokens.sessionId)).toBe(false);
  });

  it('password change keeps the old hash', async () => {
    const login = await signIn(t, 'quinn@example.com', PASSWORD);
    const before = t.stores.credentials.get(login.identity.id)?.passwordHash;
    const identity: CurrentIdentity = {
      id: login.identity.id,
      email: login.identity.email,
      sessionId: login.tokens.sessionId,
      roles: [],
      permissions: [],
      tokenIssuedAt: Math.floor(t.clock.now() / 1000),
    };

    await expect(
      t.deps.auth.authService.changePassword(
        { identity, currentPassword: PASSWORD, newPassword: 'Timesheet-2031?', client },
        expired(),
      ),
    ).rejects.toThrow('deadline passed');

    expect(t.stores.credentials.get(login.identity.id)?.passwordHash).toBe(before);
  });
});
