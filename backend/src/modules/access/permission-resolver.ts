/**
 * src/modules/access/permission-resolver.ts
 *
 * WHY:
 * - Expands an identity's roles into its effective permission set on every
 *   authenticated request, with a bounded-TTL cache in front of the store.
 *
 * KEYS:
 * - perms:ver:<identityId>            -> generation counter, bumped by invalidate() (no TTL)
 * - perms:<identityId>:<generation>   -> {"roles":[...],"permissions":[...]}   TTL = PERMISSION_CACHE_TTL_SECONDS
 *
 * RULES:
 * - A fill writes under the generation it read before loading. A load that races
 *   an invalidate() lands on a retired generation and is never read again.
 * - Cache read/write errors degrade to the store (logged); a corrupt entry is a miss.
 * - invalidate() is part of a mutation: its errors propagate.
 * - The TTL is shorter than the refresh lifetime (enforced in config).
 */

import { z } from 'zod';
import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { AccessStore } from './access-store';
import type { PermissionSet } from './access.types';

const CachedSetSchema = z.object({
  roles: z.array(z.string()),
  permissions: z.array(z.string()),
});

function normalize(slugs: readonly string[]): string[] {
  return [...new Set(slugs)].sort();
}

function parseCached(raw: string): PermissionSet | null {
  try {
    const parsed = CachedSetSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class PermissionResolver {
  constructor(
    private readonly deps: {
      cache: Cache;
      store: AccessStore;
      logger: Logger;
      ttlSeconds: number;
    },
  ) {}

  static key(identityId: string, generation = 0): string {
    return `perms:${identityId}:${generation}`;
  }

  static generationKey(identityId: string): string {
    return `perms:ver:${identityId}`;
  }

  async resolve(identityId: string): Promise<PermissionSet> {
    let key: string;
    let raw: string | null;
    try {
      const generation = Number(await this.deps.cache.get(PermissionResolver.generationKey(identityId)));
      key = PermissionResolver.key(identityId, Number.isFinite(generation) ? generation : 0);
      raw = await this.deps.cache.get(key);
    } catch (err) {
      this.deps.logger.warn('access.permission_cache.read_failed', {
        flow: 'access.resolve',
        identityId,
        message: errorMessage(err),
      });
      return this.load(identityId);
    }

    if (raw !== null) {
      const cached = parseCached(raw);
      if (cached) return cached;
    }

    const resolved = await this.load(identityId);

    try {
      await this.deps.cache.set(key, JSON.stringify(resolved), { ttlSeconds: this.deps.ttlSeconds });
    } catch (err) {
      this.deps.logger.warn('access.permission_cache.write_failed', {
        flow: 'access.resolve',
        identityId,
        message: errorMessage(err),
      });
    }

    return resolved;
  }

  /** Retires the current generation; every later resolve() reloads from the store. */
  async invalidate(identityId: string): Promise<void> {
    await this.deps.cache.incr(PermissionResolver.generationKey(identityId));
  }

  async invalidateMany(identityIds: readonly string[]): Promise<void> {
    await Promise.all(identityIds.map((id) => this.invalidate(id)));
  }

  private async load(identityId: string): Promise<PermissionSet> {
    const raw = await this.deps.store.loadPermissionSet(identityId);
    return { roles: normalize(raw.roles), permissions: normalize(raw.permissions) };
  }
}
