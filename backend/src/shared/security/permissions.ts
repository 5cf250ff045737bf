/**
 * src/shared/security/permissions.ts
 *
 * Permission slug matching. A held slug satisfies a requirement when it is
 * identical, is "*", or is a "module.*" wildcard whose prefix matches.
 * Only the trailing ".*" form is a wildcard; no other glob syntax is recognized.
 */

export const ALL_PERMISSIONS = '*';

export function hasPermission(held: readonly string[], required: string): boolean {
  return held.some((slug) => {
    if (slug === required || slug === ALL_PERMISSIONS) return true;
    if (!slug.endsWith('.*')) return false;
    return required.startsWith(slug.slice(0, -1));
  });
}

export function hasAny(held: readonly string[], required: readonly string[]): boolean {
  return required.some((slug) => hasPermission(held, slug));
}

export function hasAll(held: readonly string[], required: readonly string[]): boolean {
  return required.every((slug) => hasPermission(held, slug));
}
