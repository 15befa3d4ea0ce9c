import { z } from 'zod';
import type { RowQuery } from '../db/index.js';
import type { IdentitySource } from './identitySource.js';
import { PermissionSchema, type Permission } from './decision.js';
import { validate } from '../validation/zod-middleware.js';

const ActorRoleRowSchema = z.object({
    active: z.boolean(),
    role_name: z.string().nullable()
});

const PermissionRowSchema = z.object({
    action: z.string(),
    resource_pattern: z.string(),
    effect: PermissionSchema.shape.effect
});

function quoteIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
}

/**
 * Identity source backed by the IAM schema. Inactive actors resolve as
 * unknown. Queries are not cancellable mid-flight; the signal is checked
 * before each one and the engine's deadline bounds the wait.
 */
export class PgIdentitySource implements IdentitySource {
    private readonly schema: string;

    constructor(private readonly db: RowQuery, schema = 'iam') {
        this.schema = quoteIdentifier(schema);
    }

    async resolveRoles(actorId: string, signal: AbortSignal): Promise<readonly string[] | null> {
        signal.throwIfAborted();

        const result = await this.db.query(
            `SELECT a.active, r.role_name
             FROM ${this.schema}.actors a
             LEFT JOIN ${this.schema}.actor_roles r ON r.actor_id = a.actor_id
             WHERE a.actor_id = $1
             ORDER BY r.role_name`,
            [actorId]
        );

        const rows = validate(z.array(ActorRoleRowSchema), result.rows, 'IamStore:actor_roles');
        const first = rows[0];
        if (!first || !first.active) return null;

        return rows.flatMap(row => (row.role_name === null ? [] : [row.role_name]));
    }

    async getPermissions(role: string, signal: AbortSignal): Promise<readonly Permission[]> {
        signal.throwIfAborted();

        const result = await this.db.query(
            `SELECT action, resource_pattern, effect
             FROM ${this.schema}.role_permissions
             WHERE role_name = $1
             ORDER BY action, resource_pattern, effect`,
            [role]
        );

        return validate(z.array(PermissionRowSchema), result.rows, 'IamStore:role_permissions')
            .map(row => Object.freeze({
                action: row.action,
                resourcePattern: row.resource_pattern,
                effect: row.effect
            }));
    }
}
