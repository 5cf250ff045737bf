/**
 * backend/src/modules/access/access.audit.ts
 *
 * WHY:
 * - Typed audit helpers for role/permission mutations.
 *
 * RULES:
 * - Call AFTER the mutation and cache eviction succeed.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditRoleAssigned(
  writer: AuditWriter,
  data: { identityId: string; role: string },
): Promise<void> {
  return writer.append('access.role.assigned', data);
}

export function auditRoleRevoked(
  writer: AuditWriter,
  data: { identityId: string; role: string },
): Promise<void> {
  return writer.append('access.role.revoked', data);
}

export function auditPermissionGranted(
  writer: AuditWriter,
  data: { role: string; permission: string; affectedIdentities: number },
): Promise<void> {
  return writer.append('access.permission.granted', data);
}

export function auditPermissionRevoked(
  writer: AuditWriter,
  data: { role: string; permission: string; affectedIdentities: number },
): Promise<void> {
  return writer.append('access.permission.revoked', data);
}
