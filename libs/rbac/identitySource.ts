import type { Permission } from './decision.js';

/**
 * External system of record for role membership and role permissions.
 * Implementations must honour the abort signal; the decision engine gives up
 * on a call once its deadline passes.
 */
export interface IdentitySource {
    /** Roles held by an actor, or null when the actor is unknown. */
    resolveRoles(actorId: string, signal: AbortSignal): Promise<readonly string[] | null>;
    /** Permissions granted by a role. An unknown role grants nothing. */
    getPermissions(role: string, signal: AbortSignal): Promise<readonly Permission[]>;
}

export interface StaticIdentityData {
    readonly actors: Readonly<Record<string, readonly string[]>>;
    readonly roles: Readonly<Record<string, readonly Permission[]>>;
}

/**
 * In-memory identity source for local runs and tests.
 */
export class StaticIdentitySource implements IdentitySource {
    private readonly actors: Map<string, readonly string[]>;
    private readonly roles: Map<string, readonly Permission[]>;

    constructor(data: StaticIdentityData) {
        this.actors = new Map(Object.entries(data.actors));
        this.roles = new Map(Object.entries(data.roles));
    }

    async resolveRoles(actorId: string): Promise<readonly string[] | null> {
        return this.actors.get(actorId) ?? null;
    }

    async getPermissions(role: string): Promise<readonly Permission[]> {
        return this.roles.get(role) ?? [];
    }

    setActorRoles(actorId: string, roles: readonly string[]): void {
        this.actors.set(actorId, roles);
    }

    removeActor(actorId: string): void {
        this.actors.delete(actorId);
    }

    setRolePermissions(role: string, permissions: readonly Permission[]): void {
        this.roles.set(role, permissions);
    }
}
