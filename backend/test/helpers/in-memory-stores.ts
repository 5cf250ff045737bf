/**
 * In-process stand-ins for the relational store, behind the same interfaces the
 * Kysely implementations satisfy. Records are copied on the way in and out so a
 * test cannot observe a mutation the store did not make.
 */

import { randomUUID } from 'node:crypto';

import type { AuditRepo } from '../../src/shared/audit/audit.repo';
import type { AuditEventInsert } from '../../src/shared/audit/audit.types';
import type { Cache } from '../../src/shared/cache/cache';
import type { AccessStore } from '../../src/modules/access/access-store';
import type { Permission, PermissionSet, Role } from '../../src/modules/access/access.types';
import type { CredentialStore } from '../../src/modules/identities/credential-store';
import type {
  IdentityWithHash,
  PasswordResetToken,
} from '../../src/modules/identities/identity.types';
import type { SessionRepo } from '../../src/modules/sessions/session.repo';
import type { SessionRecord } from '../../src/modules/sessions/session.types';

// ── Credentials ───────────────────────────────────────────────

type StoredResetToken = {
  id: string;
  identityId: string;
  tokenHash: string;
  expiresAt: Date;
  usedAt: Date | null;
};

export type NewIdentity = Partial<Omit<IdentityWithHash, 'email' | 'passwordHash'>> & {
  email: string;
  passwordHash: string;
};

export class InMemoryCredentialStore implements CredentialStore {
  readonly identities = new Map<string, IdentityWithHash>();
  readonly resetTokens: StoredResetToken[] = [];

  add(input: NewIdentity): IdentityWithHash {
    const identity: IdentityWithHash = {
      id: randomUUID(),
      phone: null,
      status: 'active',
      twoFactorEnabled: false,
      failedLoginAttempts: 0,
      lockedUntil: null,
      passwordChangedAt: null,
      emailVerifiedAt: null,
      lastLoginAt: null,
      ...input,
      email: input.email.toLowerCase(),
    };
    this.identities.set(identity.id, identity);
    return { ...identity };
  }

  /** Direct read for assertions. */
  get(identityId: string): IdentityWithHash | undefined {
    const found = this.identities.get(identityId);
    return found ? { ...found } : undefined;
  }

  private update(identityId: string, patch: Partial<IdentityWithHash>): void {
    const current = this.identities.get(identityId);
    if (current) this.identities.set(identityId, { ...current, ...patch });
  }

  findByEmail(email: string): Promise<IdentityWithHash | undefined> {
    const wanted = email.toLowerCase();
    const found = [...this.identities.values()].find((i) => i.email === wanted);
    return Promise.resolve(found ? { ...found } : undefined);
  }

  findById(identityId: string): Promise<IdentityWithHash | undefined> {
    return Promise.resolve(this.get(identityId));
  }

  recordFailedLogin(params: { identityId: string; lockUntil: Date | null; at: Date }): Promise<number> {
    const current = this.identities.get(params.identityId);
    if (!current) return Promise.resolve(0);

    const failedLoginAttempts = current.failedLoginAttempts + 1;
    this.update(params.identityId, {
      failedLoginAttempts,
      lockedUntil: params.lockUntil ?? current.lockedUntil,
    });
    return Promise.resolve(failedLoginAttempts);
  }

  recordSuccessfulLogin(params: { identityId: string; ip: string; at: Date }): Promise<void> {
    this.update(params.identityId, {
      failedLoginAttempts: 0,
      lockedUntil: null,
      lastLoginAt: params.at,
    });
    return Promise.resolve();
  }

  updatePasswordHash(params: { identityId: string; passwordHash: string; changedAt: Date }): Promise<void> {
    this.update(params.identityId, {
      passwordHash: params.passwordHash,
      passwordChangedAt: params.changedAt,
    });
    return Promise.resolve();
  }

  upgradePasswordHash(params: { identityId: string; passwordHash: string; at: Date }): Promise<void> {
    this.update(params.identityId, { passwordHash: params.passwordHash });
    return Promise.resolve();
  }

  markEmailVerified(params: { identityId: string; at: Date }): Promise<void> {
    this.update(params.identityId, { emailVerifiedAt: params.at });
    return Promise.resolve();
  }

  insertPasswordResetToken(params: { identityId: string; tokenHash: string; expiresAt: Date }): Promise<void> {
    this.resetTokens.push({ id: randomUUID(), usedAt: null, ...params });
    return Promise.resolve();
  }

  invalidateActiveResetTokens(params: { identityId: string; at: Date }): Promise<void> {
    for (const token of this.resetTokens) {
      if (token.identityId === params.identityId && token.usedAt === null) token.usedAt = params.at;
    }
    return Promise.resolve();
  }

  findValidResetToken(params: { tokenHash: string; now: Date }): Promise<PasswordResetToken | undefined> {
    const token = this.resetTokens.find(
      (t) => t.tokenHash === params.tokenHash && t.usedAt === null && t.expiresAt > params.now,
    );
    return Promise.resolve(
      token ? { id: token.id, identityId: token.identityId, expiresAt: token.expiresAt } : undefined,
    );
  }

  async completePasswordReset(params: {
    tokenHash: string;
    identityId: string;
    passwordHash: string;
    at: Date;
  }): Promise<boolean> {
    const token = this.resetTokens.find(
      (t) => t.tokenHash === params.tokenHash && t.identityId === params.identityId && t.usedAt === null,
    );
    if (!token) return false;

    token.usedAt = params.at;
    await this.updatePasswordHash({
      identityId: params.identityId,
      passwordHash: params.passwordHash,
      changedAt: params.at,
    });
    this.update(params.identityId, { failedLoginAttempts: 0, lockedUntil: null });
    await this.invalidateActiveResetTokens({ identityId: params.identityId, at: params.at });
    return true;
  }
}

// ── Access ────────────────────────────────────────────────────

function moduleOf(slug: string): string {
  const dot = slug.indexOf('.');
  return dot >= 0 ? slug.slice(0, dot) : slug;
}

export class InMemoryAccessStore implements AccessStore {
  private readonly roles = new Map<string, Role>();
  private readonly permissions = new Map<string, Permission>();
  private readonly rolePermissions = new Map<string, Set<string>>();
  private readonly identityRoles = new Map<string, Set<string>>();

  /** Number of loadPermissionSet() calls; lets tests see cache hits. */
  loads = 0;

  definePermission(slug: string): Permission {
    const existing = this.permissions.get(slug);
    if (existing) return existing;

    const permission: Permission = { id: randomUUID(), slug, module: moduleOf(slug) };
    this.permissions.set(slug, permission);
    return permission;
  }

  defineRole(slug: string, permissionSlugs: string[] = []): Role {
    const role: Role = this.roles.get(slug) ?? { id: randomUUID(), slug, name: slug };
    this.roles.set(slug, role);

    const granted = this.rolePermissions.get(role.id) ?? new Set<string>();
    for (const p of permissionSlugs) granted.add(this.definePermission(p).id);
    this.rolePermissions.set(role.id, granted);

    return role;
  }

  /** Seeds an assignment without going through AccessService. */
  give(identityId: string, roleSlug: string): void {
    const role = this.roles.get(roleSlug);
    if (!role) throw new Error(`unknown role ${roleSlug}`);

    const held = this.identityRoles.get(identityId) ?? new Set<string>();
    held.add(role.id);
    this.identityRoles.set(identityId, held);
  }

  loadPermissionSet(identityId: string): Promise<PermissionSet> {
    this.loads += 1;

    const roleIds = this.identityRoles.get(identityId) ?? new Set<string>();
    const roles: string[] = [];
    const permissions: string[] = [];

    for (const role of this.roles.values()) {
      if (!roleIds.has(role.id)) continue;
      roles.push(role.slug);

      const granted = this.rolePermissions.get(role.id) ?? new Set<string>();
      for (const permission of this.permissions.values()) {
        if (granted.has(permission.id)) permissions.push(permission.slug);
      }
    }

    return Promise.resolve({ roles, permissions });
  }

  findRoleBySlug(slug: string): Promise<Role | undefined> {
    return Promise.resolve(this.roles.get(slug));
  }

  findPermissionBySlug(slug: string): Promise<Permission | undefined> {
    return Promise.resolve(this.permissions.get(slug));
  }

  listIdentitiesWithRole(roleId: string): Promise<string[]> {
    const holders = [...this.identityRoles.entries()]
      .filter(([, roleIds]) => roleIds.has(roleId))
      .map(([identityId]) => identityId);
    return Promise.resolve(holders);
  }

  assignRole(params: { identityId: string; roleId: string; assignedBy: string | null }): Promise<boolean> {
    const held = this.identityRoles.get(params.identityId) ?? new Set<string>();
    const changed = !held.has(params.roleId);
    held.add(params.roleId);
    this.identityRoles.set(params.identityId, held);
    return Promise.resolve(changed);
  }

  revokeRole(params: { identityId: string; roleId: string }): Promise<boolean> {
    const held = this.identityRoles.get(params.identityId);
    return Promise.resolve(held ? held.delete(params.roleId) : false);
  }

  grantPermission(params: { roleId: string; permissionId: string }): Promise<boolean> {
    const granted = this.rolePermissions.get(params.roleId) ?? new Set<string>();
    const changed = !granted.has(params.permissionId);
    granted.add(params.permissionId);
    this.rolePermissions.set(params.roleId, granted);
    return Promise.resolve(changed);
  }

  revokePermission(params: { roleId: string; permissionId: string }): Promise<boolean> {
    const granted = this.rolePermissions.get(params.roleId);
    return Promise.resolve(granted ? granted.delete(params.permissionId) : false);
  }
}

// ── Sessions ──────────────────────────────────────────────────

export class InMemorySessionRepo implements SessionRepo {
  readonly sessions = new Map<string, SessionRecord>();

  insert(record: SessionRecord): Promise<void> {
    this.sessions.set(record.id, { ...record });
    return Promise.resolve();
  }

  findById(sessionId: string): Promise<SessionRecord | undefined> {
    const found = this.sessions.get(sessionId);
    return Promise.resolve(found ? { ...found } : undefined);
  }

  listLive(params: { identityId: string; now: Date }): Promise<SessionRecord[]> {
    const live = [...this.sessions.values()]
      .filter(
        (s) => s.identityId === params.identityId && s.revokedAt === null && s.expiresAt > params.now,
      )
      .sort((a, b) => b.issuedAt.getTime() - a.issuedAt.getTime())
      .map((s) => ({ ...s }));
    return Promise.resolve(live);
  }

  markRevoked(params: { sessionId: string; at: Date }): Promise<void> {
    const found = this.sessions.get(params.sessionId);
    if (found && found.revokedAt === null) {
      this.sessions.set(params.sessionId, { ...found, revokedAt: params.at });
    }
    return Promise.resolve();
  }

  clearRevoked(sessionId: string): Promise<void> {
    const found = this.sessions.get(sessionId);
    if (found) this.sessions.set(sessionId, { ...found, revokedAt: null });
    return Promise.resolve();
  }

  delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
    return Promise.resolve();
  }
}

// ── Audit ─────────────────────────────────────────────────────

export class InMemoryAuditRepo implements AuditRepo {
  readonly events: AuditEventInsert[] = [];

  append(event: AuditEventInsert): Promise<void> {
    this.events.push(event);
    return Promise.resolve();
  }

  actions(): string[] {
    return this.events.map((e) => e.action);
  }

  last(action: string): AuditEventInsert | undefined {
    return [...this.events].reverse().find((e) => e.action === action);
  }
}

// ── Cache outage ──────────────────────────────────────────────

/** Every operation rejects, as a Redis client does while the server is down. */
export class UnavailableCache implements Cache {
  private fail<T>(): Promise<T> {
    return Promise.reject(new Error('cache unavailable'));
  }

  get(): Promise<string | null> {
    return this.fail();
  }
  set(): Promise<void> {
    return this.fail();
  }
  del(): Promise<void> {
    return this.fail();
  }
  incr(): Promise<number> {
    return this.fail();
  }
  setIfAbsent(): Promise<boolean> {
    return this.fail();
  }
  ttl(): Promise<number | null> {
    return this.fail();
  }
  compareAndDelete(): Promise<boolean> {
    return this.fail();
  }
  slidingWindowHit(): Promise<never> {
    return this.fail();
  }
}
