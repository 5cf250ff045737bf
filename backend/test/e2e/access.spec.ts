import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import { bearer, signIn, type ErrorBody } from '../helpers/auth-requests';

const PASSWORD = 'Payroll-2030!';

type MeBody = { roles: string[]; permissions: string[] };

describe('role and permission administration', () => {
  let t: TestApp;
  let adminToken: string;
  let managerToken: string;
  let employeeToken: string;
  let employeeId: string;

  beforeEach(async () => {
    t = await buildTestApp();
    t.stores.access.defineRole('admin', ['*']);
    t.stores.access.defineRole('hr_manager', ['employees.*', 'payroll.*', 'roles.assign']);
    t.stores.access.defineRole('employee', ['profile.view', 'profile.update']);
    t.stores.access.definePermission('reports.view');

    await t.seedIdentity({ email: 'admin@example.com', password: PASSWORD, roles: ['admin'] });
    await t.seedIdentity({ email: 'avery@example.com', password: PASSWORD, roles: ['hr_manager'] });
    employeeId = (
      await t.seedIdentity({ email: 'ellis@example.com', password: PASSWORD, roles: ['employee'] })
    ).id;

    adminToken = (await signIn(t, 'admin@example.com', PASSWORD)).tokens.accessToken;
    managerToken = (await signIn(t, 'avery@example.com', PASSWORD)).tokens.accessToken;
    employeeToken = (await signIn(t, 'ellis@example.com', PASSWORD)).tokens.accessToken;
  });

  afterEach(async () => {
    await t.close();
  });

  async function meOf(token: string): Promise<MeBody> {
    const res = await t.app.inject({ method: 'GET', url: '/auth/me', headers: bearer(token) });
    return res.json<MeBody>();
  }

  function assignRole(token: string, identityId: string, role: string) {
    return t.app.inject({
      method: 'POST',
      url: `/access/users/${identityId}/roles`,
      headers: bearer(token),
      payload: { role },
    });
  }

  it('applies a role assignment to the next request of the holder without re-login', async () => {
    const res = await assignRole(managerToken, employeeId, 'hr_manager');

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ identityId: employeeId, role: 'hr_manager', changed: true });

    expect(await meOf(employeeToken)).toMatchObject({
      roles: ['employee', 'hr_manager'],
      permissions: [
        'employees.*',
        'payroll.*',
        'profile.update',
        'profile.view',
        'roles.assign',
      ],
    });
  });

  it('drops permissions on the next request after a role is revoked', async () => {
    const res = await t.app.inject({
      method: 'DELETE',
      url: `/access/users/${employeeId}/roles/employee`,
      headers: bearer(adminToken),
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ identityId: employeeId, role: 'employee', changed: true });
    expect(await meOf(employeeToken)).toMatchObject({ roles: [], permissions: [] });
  });

  it('evicts every holder when a role gains a permission', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/access/roles/employee/permissions',
      headers: bearer(adminToken),
      payload: { permission: 'reports.view' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      role: 'employee',
      permission: 'reports.view',
      changed: true,
      affectedIdentities: 1,
    });
    expect((await meOf(employeeToken)).permissions).toContain('reports.view');
  });

  it('evicts every holder when a role loses a permission', async () => {
    const res = await t.app.inject({
      method: 'DELETE',
      url: '/access/roles/employee/permissions/profile.update',
      headers: bearer(adminToken),
    });

    expect(res.statusCode).toBe(200);
    expect((await meOf(employeeToken)).permissions).toEqual(['profile.view']);
  });

  it('denies callers without the permission', async () => {
    const res = await assignRole(employeeToken, employeeId, 'admin');

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      error: {
        code: 'PERMISSION_DENIED',
        message: 'You do not have permission to perform this action.',
      },
    });
  });

  it('keeps role management behind its own permission', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/access/roles/employee/permissions',
      headers: bearer(managerToken),
      payload: { permission: 'reports.view' },
    });

    expect(res.statusCode).toBe(403);
  });

  it('requires authentication', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: `/access/users/${employeeId}/roles`,
      payload: { role: 'admin' },
    });

    expect(res.statusCode).toBe(401);
  });

  it('reports unknown roles and malformed ids', async () => {
    const unknownRole = await assignRole(adminToken, employeeId, 'ceo');
    expect(unknownRole.statusCode).toBe(404);
    expect(unknownRole.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Role not found' },
    });

    const badId = await assignRole(adminToken, 'not-a-uuid', 'employee');
    expect(badId.statusCode).toBe(400);
    expect(badId.json<ErrorBody>().error.code).toBe('VALIDATION_ERROR');
  });

  it('audits the acting administrator', async () => {
    await assignRole(adminToken, employeeId, 'hr_manager');

    const event = t.stores.audit.last('access.role.assigned');
    const admin = await t.stores.credentials.findByEmail('admin@example.com');
    expect(event?.userId).toBe(admin?.id);
    expect(event?.metadata).toEqual({ identityId: employeeId, role: 'hr_manager' });
  });
});
