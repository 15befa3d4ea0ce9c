/**
 * Role mapping cache.
 * Stale-while-revalidate over the identity source:
 * - Fresh entries are served directly.
 * - Stale entries are served immediately while one background refresh runs.
 * - A failed refresh keeps the last-known-good entry.
 * - A cold miss waits for the source, bounded by the caller's timeout.
 * - Concurrent fetches for one key share a single inflight promise.
 */

import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import { PermissionSchema, type Permission } from './decision.js';
import type { IdentitySource } from './identitySource.js';
import { IdentityResolutionError } from '../errors/coreErrors.js';
import { validate } from '../validation/zod-middleware.js';
import { logger } from '../logging/logger.js';

const log = logger.child({ component: 'RoleMappingCache' });

interface CacheEntry<T> {
    readonly value: T;
    readonly fetchedAt: number;
}

export interface RoleMappingCacheOptions {
    readonly stalenessWindowMs: number;
    readonly maxCachedActors: number;
    readonly maxCachedRoles: number;
    readonly clock?: () => number;
}

const RolesSchema = z.array(z.string().min(1));
const PermissionsSchema = z.array(PermissionSchema);

/**
 * Runs an identity-source call under a deadline. Every failure surfaces as
 * IdentityResolutionError so callers only handle one error type.
 */
async function withDeadline<T>(
    subject: string,
    timeoutMs: number,
    task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new IdentityResolutionError(subject, 'TIMEOUT'));
        }, timeoutMs);
    });

    const work = task(controller.signal);
    // The source may still settle after the deadline has won.
    void work.catch(err => log.debug({ subject, err }, 'Identity source call settled with error'));

    try {
        return await Promise.race([work, deadline]);
    } catch (err) {
        if (err instanceof IdentityResolutionError) throw err;
        throw new IdentityResolutionError(subject, 'SOURCE_FAILURE', { cause: err });
    } finally {
        clearTimeout(timer);
    }
}

/**
 * One LRU-bounded table of mappings with its own inflight map.
 */
class MappingTable<T> {
    private readonly entries: LRUCache<string, CacheEntry<T>>;
    private readonly inflight = new Map<string, Promise<T>>();

    constructor(
        max: number,
        private readonly stalenessWindowMs: number,
        private readonly clock: () => number,
        private readonly refreshes: Set<Promise<void>>
    ) {
        this.entries = new LRUCache({ max });
    }

    async read(
        key: string,
        timeoutMs: number,
        fetcher: (signal: AbortSignal) => Promise<T | null>
    ): Promise<T> {
        const entry = this.entries.get(key);

        if (entry) {
            if (this.clock() - entry.fetchedAt >= this.stalenessWindowMs) {
                this.refreshInBackground(key, timeoutMs, fetcher);
            }
            return entry.value;
        }

        return this.fetch(key, timeoutMs, fetcher);
    }

    delete(key: string): void {
        this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
    }

    private refreshInBackground(
        key: string,
        timeoutMs: number,
        fetcher: (signal: AbortSignal) => Promise<T | null>
    ): void {
        if (this.inflight.has(key)) return;

        const refresh = this.fetch(key, timeoutMs, fetcher).then(
            () => undefined,
            (err: unknown) => {
                log.warn({ key, err }, 'Identity refresh failed; serving last-known-good mapping');
            }
        );

        this.refreshes.add(refresh);
        void refresh.finally(() => this.refreshes.delete(refresh));
    }

    private async fetch(
        key: string,
        timeoutMs: number,
        fetcher: (signal: AbortSignal) => Promise<T | null>
    ): Promise<T> {
        const existing = this.inflight.get(key);
        if (existing) return existing;

        const promise = (async () => {
            const value = await withDeadline(key, timeoutMs, fetcher);
            if (value === null) {
                // Authoritative: the subject no longer exists.
                this.entries.delete(key);
                throw new IdentityResolutionError(key, 'UNKNOWN_ACTOR');
            }
            this.entries.set(key, { value, fetchedAt: this.clock() });
            return value;
        })();

        this.inflight.set(key, promise);
        try {
            return await promise;
        } finally {
            this.inflight.delete(key);
        }
    }
}

export class RoleMappingCache {
    private readonly actorRoles: MappingTable<readonly string[]>;
    private readonly rolePermissions: MappingTable<readonly Permission[]>;
    private readonly refreshes = new Set<Promise<void>>();

    constructor(
        private readonly source: IdentitySource,
        options: RoleMappingCacheOptions
    ) {
        const clock = options.clock ?? Date.now;
        this.actorRoles = new MappingTable(options.maxCachedActors, options.stalenessWindowMs, clock, this.refreshes);
        this.rolePermissions = new MappingTable(options.maxCachedRoles, options.stalenessWindowMs, clock, this.refreshes);
    }

    /**
     * @throws IdentityResolutionError UNKNOWN_ACTOR, TIMEOUT or SOURCE_FAILURE
     */
    async rolesFor(actorId: string, timeoutMs: number): Promise<readonly string[]> {
        return this.actorRoles.read(actorId, timeoutMs, async signal => {
            const roles = await this.source.resolveRoles(actorId, signal);
            if (roles === null) return null;
            return Object.freeze(validate(RolesSchema, roles, 'IdentitySource:roles'));
        });
    }

    /**
     * @throws IdentityResolutionError TIMEOUT or SOURCE_FAILURE, with the role as subject
     */
    async permissionsFor(role: string, timeoutMs: number): Promise<readonly Permission[]> {
        return this.rolePermissions.read(role, timeoutMs, async signal => {
            const permissions = await this.source.getPermissions(role, signal);
            return Object.freeze(validate(PermissionsSchema, permissions, 'IdentitySource:permissions'));
        });
    }

    invalidateActor(actorId: string): void {
        this.actorRoles.delete(actorId);
    }

    invalidateRole(role: string): void {
        this.rolePermissions.delete(role);
    }

    clear(): void {
        this.actorRoles.clear();
        this.rolePermissions.clear();
    }

    /**
     * Resolves once every background refresh started so far has settled.
     */
    async settled(): Promise<void> {
        await Promise.all([...this.refreshes]);
    }
}
