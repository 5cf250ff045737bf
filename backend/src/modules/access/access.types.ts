/**
 * src/modules/access/access.types.ts
 */

/** Effective authorization of one identity: de-duplicated, sorted slugs. */
export type PermissionSet = {
  roles: string[];
  permissions: string[];
};

export type Role = {
  id: string;
  slug: string;
  name: string;
};

export type Permission = {
  id: string;
  slug: string;
  module: string;
};
