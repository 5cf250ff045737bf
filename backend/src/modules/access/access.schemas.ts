/**
 * backend/src/modules/access/access.schemas.ts
 *
 * WHY:
 * - Request validation for role/permission administration.
 */

import { z } from 'zod';

const slug = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[a-z0-9_]+$/, 'Invalid role slug');

const permissionSlug = z
  .string()
  .min(1)
  .max(100)
  .regex(/^(\*|[a-z0-9_]+\.(\*|[a-z0-9_]+))$/, 'Invalid permission slug');

export const identityParamsSchema = z.object({
  identityId: z.string().uuid(),
});

export const identityRoleParamsSchema = identityParamsSchema.extend({
  role: slug,
});

export const assignRoleSchema = z.object({
  role: slug,
});

export const roleParamsSchema = z.object({
  role: slug,
});

export const rolePermissionParamsSchema = roleParamsSchema.extend({
  permission: permissionSlug,
});

export const grantPermissionSchema = z.object({
  permission: permissionSlug,
});
