import { describe, it, expect, beforeEach } from 'vitest';
import { AccessService, type AccessActor } from '../../../../src/modules/access/access.service';
import { PermissionResolver } from '../../../../src/modules/access/permission-resolver';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { logger } from '../../../../src/shared/logger/logger';
import {
  InMemoryAccessStore,
  InMemoryAuditRepo,
  InMemoryCredentialStore,
} from '../../../helpers/in-memory-stores';

describe('AccessService', () => {
  let credentials: InMemoryCredentialStore;
  let store: InMemoryAccessStore;
  let audit: InMemoryAuditRepo;
  let resolver: PermissionResolver;
  let service: AccessService;
  let actor: AccessActor;
  let aliceId: string;
  let bobId: string;

  beforeEach(() => {
    credentials = new InMemoryCredentialStore();
    store = new InMemoryAccessStore();
    audit = new InMemoryAuditRepo();
    resolver = new PermissionResolver({
      cache: new InMemCache(),
      store,
      logger,
      ttlSeconds: 300,
    });
    service = new AccessService({
      accessStore: store,
      credentialStore: credentials,
      permissionResolver: resolver,
      auditRepo: audit,
      logger,
    });

    store.defineRole('employee', ['profile.view']);
    store.defineRole('hr_manager', ['payroll.*']);
    store.definePermission('payroll.view');

    const admin = credentials.add({ email: 'admin@example.com', passwordHash: 'unused' });
    aliceId = credentials.add({ email: 'alice@example.com', passwordHash: 'unused' }).id;
    bobId = credentials.add({ email: 'bob@example.com', passwordHash: 'unused' }).id;
    store.give(aliceId, 'employee');
    store.give(bobId, 'employee');

    actor = { identityId: admin.id, requestId: 'req-1', ip: '10.0.0.1', userAgent: 'vitest' };
  });

  it('assignRole takes effect on the very next resolution', async () => {
    expect((await resolver.resolve(aliceId)).permissions).toEqual(['profile.view']);

    expect(await service.assignRole({ identityId: aliceId, role: 'hr_manager' }, actor)).toEqual({
      changed: true,
    });

    expect((await resolver.resolve(aliceId)).permissions).toEqual(['payroll.*', 'profile.view']);
  });

  it('audits a real change once and reports repeats as unchanged', async () => {
    await service.assignRole({ identityId: aliceId, role: 'hr_manager' }, actor);
    const again = await service.assignRole({ identityId: aliceId, role: 'hr_manager' }, actor);

    expect(again).toEqual({ changed: false });
    expect(audit.actions()).toEqual(['access.role.assigned']);
    expect(audit.last('access.role.assigned')).toEqual({
      userId: actor.identityId,
      requestId: 'req-1',
      ip: '10.0.0.1',
      userAgent: 'vitest',
      action: 'access.role.assigned',
      metadata: { identityId: aliceId, role: 'hr_manager' },
    });
  });

  it('revokeRole removes the permissions immediately', async () => {
    await resolver.resolve(aliceId);

    expect(await service.revokeRole({ identityId: aliceId, role: 'employee' }, actor)).toEqual({
      changed: true,
    });
    expect(await resolver.resolve(aliceId)).toEqual({ roles: [], permissions: [] });
  });

  it('grantPermission evicts every holder of the role', async () => {
    await resolver.resolve(aliceId);
    await resolver.resolve(bobId);

    const result = await service.grantPermission(
      { role: 'employee', permission: 'payroll.view' },
      actor,
    );

    expect(result).toEqual({ changed: true, affectedIdentities: 2 });
    expect((await resolver.resolve(aliceId)).permissions).toEqual(['payroll.view', 'profile.view']);
    expect((await resolver.resolve(bobId)).permissions).toEqual(['payroll.view', 'profile.view']);
  });

  it('revokePermission evicts every holder of the role', async () => {
    await resolver.resolve(aliceId);

    const result = await service.revokePermission(
      { role: 'employee', permission: 'profile.view' },
      actor,
    );

    expect(result).toEqual({ changed: true, affectedIdentities: 2 });
    expect((await resolver.resolve(aliceId)).permissions).toEqual([]);
    expect(audit.last('access.permission.revoked')?.metadata).toEqual({
      role: 'employee',
      permission: 'profile.view',
      affectedIdentities: 2,
    });
  });

  it('rejects unknown identities, roles and permissions with 404', async () => {
    await expect(
      service.assignRole({ identityId: '00000000-0000-4000-8000-000000000000', role: 'employee' }, actor),
    ).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'Identity not found' });

    await expect(
      service.assignRole({ identityId: aliceId, role: 'ceo' }, actor),
    ).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'Role not found' });

    await expect(
      service.grantPermission({ role: 'employee', permission: 'payroll.delete' }, actor),
    ).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'Permission not found' });
  });
});
