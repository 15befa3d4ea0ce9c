/**
 * RBAC Decision Engine
 * Resolves an actor's roles through the cache, then evaluates the pure
 * policy. Fails closed: any resolution failure yields a DENY decision that
 * records why.
 */

import type { Actor } from '../envelope/types.js';
import type { RbacConfig } from '../config/coreConfig.js';
import type { IdentitySource } from './identitySource.js';
import { RoleMappingCache } from './roleMappingCache.js';
import { evaluatePolicy, identityFailureDecision, type Permission, type PolicyDecision } from './decision.js';
import { IdentityResolutionError } from '../errors/coreErrors.js';
import { logger } from '../logging/logger.js';

const log = logger.child({ component: 'RbacDecisionEngine' });

export interface AuthorizeOptions {
    /** Overall bound on identity resolution for this call. */
    readonly timeoutMs?: number;
}

export interface RbacEngineOptions {
    readonly clock?: () => number;
}

export class RbacDecisionEngine {
    private readonly cache: RoleMappingCache;
    private readonly clock: () => number;

    constructor(
        source: IdentitySource,
        private readonly config: RbacConfig,
        options: RbacEngineOptions = {}
    ) {
        this.clock = options.clock ?? Date.now;
        this.cache = new RoleMappingCache(source, {
            stalenessWindowMs: config.stalenessWindowMs,
            maxCachedActors: config.maxCachedActors,
            maxCachedRoles: config.maxCachedRoles,
            clock: this.clock
        });
    }

    /**
     * Never throws for identity problems: an unresolvable actor is a DENY
     * carrying failure.code IDENTITY_RESOLUTION_FAILED.
     */
    async authorize(actor: Actor, action: string, resource: string, options: AuthorizeOptions = {}): Promise<PolicyDecision> {
        const budgetMs = options.timeoutMs ?? this.config.resolutionTimeoutMs;
        const deadline = this.clock() + budgetMs;
        const remaining = () => Math.max(1, deadline - this.clock());

        let roles: readonly string[];
        const permissionsByRole = new Map<string, readonly Permission[]>();

        try {
            roles = await this.cache.rolesFor(actor.id, remaining());
            const distinct = [...new Set(roles)];
            const tables = await Promise.all(distinct.map(role => this.cache.permissionsFor(role, remaining())));
            distinct.forEach((role, i) => permissionsByRole.set(role, tables[i] ?? []));
        } catch (err) {
            const reason = err instanceof IdentityResolutionError ? err.reason : 'SOURCE_FAILURE';
            log.warn({ actorId: actor.id, action, resource, reason, err }, 'Identity resolution failed; denying');
            return identityFailureDecision(actor.id, action, resource, reason);
        }

        const decision = evaluatePolicy({ actorId: actor.id, action, resource, roles, permissionsByRole });

        log.debug({
            actorId: actor.id,
            action,
            resource,
            effect: decision.effect,
            reason: decision.reason
        }, 'RBAC decision');

        return decision;
    }

    /** Drops the cached role set of one actor; the next call resolves cold. */
    invalidateActor(actorId: string): void {
        this.cache.invalidateActor(actorId);
    }

    invalidateRole(role: string): void {
        this.cache.invalidateRole(role);
    }

    clearCache(): void {
        this.cache.clear();
    }

    /** Waits for background refreshes. Used by shutdown and tests. */
    async settled(): Promise<void> {
        await this.cache.settled();
    }
}
