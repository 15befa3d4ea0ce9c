/**
 * Unit Tests: PgIdentitySource
 *
 * Runs against an in-process database stand-in; only statements and row
 * mapping are checked here.
 *
 * @see libs/rbac/pgIdentitySource.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { PgIdentitySource } from '../../libs/rbac/pgIdentitySource.js';
import { RbacDecisionEngine } from '../../libs/rbac/engine.js';
import { SchemaError } from '../../libs/errors/coreErrors.js';
import { FakeDatabase, RBAC_CONFIG } from '../helpers/fixtures.js';

const signal = new AbortController().signal;

describe('PgIdentitySource', () => {
    let db: FakeDatabase;
    let source: PgIdentitySource;

    beforeEach(() => {
        db = new FakeDatabase();
        source = new PgIdentitySource(db);
    });

    it('should resolve the roles of an active actor', async () => {
        db.respond({ rows: [{ active: true, role_name: 'editor' }, { active: true, role_name: 'viewer' }] });

        assert.deepStrictEqual(await source.resolveRoles('u1', signal), ['editor', 'viewer']);
        assert.deepStrictEqual(db.queries[0], {
            text: 'SELECT a.active, r.role_name FROM "iam".actors a LEFT JOIN "iam".actor_roles r ON r.actor_id = a.actor_id WHERE a.actor_id = $1 ORDER BY r.role_name',
            params: ['u1']
        });
    });

    it('should resolve an unknown actor to null', async () => {
        db.respond({ rows: [] });
        assert.strictEqual(await source.resolveRoles('ghost', signal), null);
    });

    it('should resolve an inactive actor to null', async () => {
        db.respond({ rows: [{ active: false, role_name: 'admin' }] });
        assert.strictEqual(await source.resolveRoles('u1', signal), null);
    });

    it('should resolve an actor without roles to an empty set', async () => {
        db.respond({ rows: [{ active: true, role_name: null }] });
        assert.deepStrictEqual(await source.resolveRoles('u1', signal), []);
    });

    it('should map permission rows', async () => {
        db.respond({
            rows: [
                { action: 'read', resource_pattern: 'orders/*', effect: 'ALLOW' },
                { action: 'write', resource_pattern: 'orders/*', effect: 'DENY' }
            ]
        });

        assert.deepStrictEqual(await source.getPermissions('clerk', signal), [
            { action: 'read', resourcePattern: 'orders/*', effect: 'ALLOW' },
            { action: 'write', resourcePattern: 'orders/*', effect: 'DENY' }
        ]);
        assert.deepStrictEqual(db.queries[0]?.params, ['clerk']);
        assert.match(db.queries[0]?.text ?? '', /FROM "iam"\.role_permissions WHERE role_name = \$1/);
    });

    it('should reject rows with an unknown effect', async () => {
        db.respond({ rows: [{ action: 'read', resource_pattern: 'orders/*', effect: 'MAYBE' }] });
        await assert.rejects(source.getPermissions('clerk', signal), SchemaError);
    });

    it('should quote a custom schema name', async () => {
        const custom = new PgIdentitySource(db, 'iam_eu');
        await custom.getPermissions('clerk', signal);
        assert.match(db.queries[0]?.text ?? '', /FROM "iam_eu"\.role_permissions/);
    });

    it('should not query once the signal is aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        await assert.rejects(source.resolveRoles('u1', controller.signal), { name: 'AbortError' });
        assert.strictEqual(db.queries.length, 0);
    });

    it('should back the decision engine', async () => {
        db.respond(
            { rows: [{ active: true, role_name: 'clerk' }] },
            { rows: [{ action: 'read', resource_pattern: 'orders/*', effect: 'ALLOW' }] }
        );
        const engine = new RbacDecisionEngine(source, RBAC_CONFIG);

        const decision = await engine.authorize({ id: 'u1', kind: 'user' }, 'read', 'orders/42');
        assert.strictEqual(decision.effect, 'ALLOW');
        assert.strictEqual(decision.reason, 'allowed by clerk:read:orders/*');
    });
});
