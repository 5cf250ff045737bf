import { describe, it, expect } from 'vitest';
import { hasAll, hasAny, hasPermission } from '../../../../src/shared/security/permissions';

describe('hasPermission', () => {
  it('matches an identical slug', () => {
    expect(hasPermission(['employees.view'], 'employees.view')).toBe(true);
    expect(hasPermission(['employees.view'], 'employees.manage')).toBe(false);
  });

  it('matches a module wildcard against its own module only', () => {
    expect(hasPermission(['payroll.*'], 'payroll.approve')).toBe(true);
    expect(hasPermission(['payroll.*'], 'reports.view')).toBe(false);
    expect(hasPermission(['payroll.*'], 'payrollx.view')).toBe(false);
    expect(hasPermission(['payroll.*'], 'payroll')).toBe(false);
  });

  it('lets "*" satisfy everything', () => {
    expect(hasPermission(['*'], 'roles.manage')).toBe(true);
  });

  it('treats nothing else as a glob', () => {
    expect(hasPermission(['payroll.r*'], 'payroll.run')).toBe(false);
  });

  it('denies when nothing is held', () => {
    expect(hasPermission([], 'profile.view')).toBe(false);
  });
});

describe('hasAny / hasAll', () => {
  const held = ['employees.*', 'profile.view'];

  it('hasAny needs one match', () => {
    expect(hasAny(held, ['payroll.run', 'employees.view'])).toBe(true);
    expect(hasAny(held, ['payroll.run', 'roles.manage'])).toBe(false);
  });

  it('hasAll needs every match', () => {
    expect(hasAll(held, ['employees.manage', 'profile.view'])).toBe(true);
    expect(hasAll(held, ['employees.manage', 'profile.update'])).toBe(false);
  });
});
