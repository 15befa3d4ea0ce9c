/**
 * Unit Tests: MessageProcessor
 *
 * Pipeline order: validate, authorize (audited), handle, audit outcome.
 *
 * @see libs/service/processor.ts
 * @see libs/service/runtime.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { createPgAdapters, createTrustRuntime, type TrustRuntime } from '../../libs/service/runtime.js';
import type { Service } from '../../libs/service/types.js';
import type { Envelope } from '../../libs/envelope/types.js';
import { deserializeEnvelope, serializeEnvelope } from '../../libs/envelope/codec.js';
import { createCoreConfig } from '../../libs/config/coreConfig.js';
import { StaticIdentitySource } from '../../libs/rbac/identitySource.js';
import { InMemoryAuditStore } from '../../libs/audit/store.js';
import type { AuditEvent } from '../../libs/audit/schema.js';
import { RegistrationClient } from '../../libs/registry/client.js';
import type { RegistryTransport } from '../../libs/registry/transport.js';
import { AuthorizationDenied, ContentionError, SchemaError } from '../../libs/errors/coreErrors.js';
import { InternalSystemError } from '../../libs/errors/sanitizer.js';
import { FakeDatabase, allow, userQuery, userRequest } from '../helpers/fixtures.js';

const STREAM = 'service:docs-api';

describe('MessageProcessor', () => {
    let store: InMemoryAuditStore;
    let runtime: TrustRuntime;
    let handled: Envelope[];
    let failWith: unknown;
    let replyWith: 'text' | 'none';
    let hooks: string[];

    const service: Service = {
        name: 'docs-handler',
        async handle(envelope, context) {
            handled.push(envelope);
            if (failWith !== undefined) throw failWith;
            if (replyWith === 'none') return null;
            return context.reply({ messageType: 'user.reply', payload: { text: `handled by ${context.decision.reason}` } });
        },
        async onStartup() { hooks.push('startup'); },
        async onShutdown() { hooks.push('shutdown'); }
    };

    async function auditTrail(): Promise<AuditEvent[]> {
        const events: AuditEvent[] = [];
        for await (const event of runtime.chain.read(STREAM)) events.push(event);
        return events;
    }

    beforeEach(() => {
        store = new InMemoryAuditStore();
        handled = [];
        failWith = undefined;
        replyWith = 'text';
        hooks = [];
        runtime = createTrustRuntime(createCoreConfig({ service: { name: 'docs-api' } }), {
            identitySource: new StaticIdentitySource({
                actors: { u1: ['viewer'] },
                roles: { viewer: [allow('query', 'conversations/*'), allow('read', 'docs/*')] }
            }),
            auditStore: store
        });
    });

    it('should handle an authorized message and reply in its causality chain', async () => {
        const processor = runtime.createProcessor(service);
        const request = userQuery('u1', 'where is report 1?');

        const outcome = await processor.process(serializeEnvelope(request));

        assert.strictEqual(outcome.status, 'processed');
        if (outcome.status !== 'processed') return;
        assert.deepStrictEqual(outcome.envelope, request);
        assert.strictEqual(outcome.decision.effect, 'ALLOW');
        assert.ok(outcome.reply);
        assert.strictEqual(outcome.reply.causalityId, request.causalityId);
        assert.strictEqual(outcome.reply.parentMessageId, request.messageId);
        assert.deepStrictEqual(outcome.reply.actor, { id: 'docs-api', kind: 'service' });
        assert.deepStrictEqual(outcome.reply.authContext, request.authContext);
        assert.deepStrictEqual(outcome.reply.payload, { text: 'handled by allowed by viewer:query:conversations/*' });
        assert.deepStrictEqual(deserializeEnvelope(outcome.replyBody ?? ''), outcome.reply);

        const trail = await auditTrail();
        assert.deepStrictEqual(trail.map(e => [e.eventType, e.outcome, e.action, e.resource]), [
            ['authorization', 'ALLOW', 'query', 'conversations/default'],
            ['data_access', 'ALLOW', 'query', 'conversations/default']
        ]);
        assert.deepStrictEqual(trail[1]?.details, { handler: 'docs-handler', reply_message_id: outcome.reply.messageId });
    });

    it('should accept the wire form as bytes', async () => {
        const processor = runtime.createProcessor(service);
        const body = new TextEncoder().encode(serializeEnvelope(userRequest('u1', 'read', 'docs/report-1')));

        const outcome = await processor.process(body);

        assert.strictEqual(outcome.status, 'processed');
        assert.strictEqual(handled.length, 1);
    });

    it('should reject malformed input before authorization', async () => {
        const processor = runtime.createProcessor(service);

        const outcome = await processor.process('{"version":"v1","message_type":"user.query"}');

        assert.strictEqual(outcome.status, 'rejected');
        if (outcome.status === 'rejected') assert.ok(outcome.error instanceof SchemaError);
        assert.strictEqual(handled.length, 0);
        assert.strictEqual(store.size(), 0);
    });

    it('should audit a denial and never call the handler', async () => {
        const processor = runtime.createProcessor(service);

        const outcome = await processor.process(serializeEnvelope(userRequest('u1', 'write', 'docs/report-1')));

        assert.strictEqual(outcome.status, 'rejected');
        if (outcome.status === 'rejected') {
            assert.ok(outcome.error instanceof AuthorizationDenied);
            assert.strictEqual(outcome.error.decision.reason, 'no matching rule');
        }
        assert.strictEqual(handled.length, 0);
        assert.deepStrictEqual((await auditTrail()).map(e => [e.eventType, e.outcome]), [['authorization', 'DENY']]);
    });

    it('should deny unknown actors', async () => {
        const processor = runtime.createProcessor(service);

        const outcome = await processor.process(serializeEnvelope(userQuery('ghost', 'hello')));

        assert.strictEqual(outcome.status, 'rejected');
        const [event] = await auditTrail();
        assert.deepStrictEqual(event?.details.failure, { code: 'IDENTITY_RESOLUTION_FAILED', reason: 'UNKNOWN_ACTOR' });
    });

    it('should audit handler failures as ERROR and return them sanitized', async () => {
        const processor = runtime.createProcessor(service);
        failWith = new Error('connection reset by peer');

        const outcome = await processor.process(serializeEnvelope(userQuery('u1', 'hi')));

        assert.strictEqual(outcome.status, 'failed');
        if (outcome.status !== 'failed') return;
        assert.ok(outcome.error instanceof InternalSystemError);
        assert.strictEqual(outcome.error.publicMessage, 'An internal system error occurred (Handler:docs-handler)');

        const [authz, failure] = await auditTrail();
        assert.strictEqual(authz?.outcome, 'ALLOW');
        assert.strictEqual(failure?.eventType, 'error');
        assert.strictEqual(failure?.outcome, 'ERROR');
        assert.deepStrictEqual(failure?.details, {
            handler: 'docs-handler',
            error_code: 'INTERNAL',
            incident_id: outcome.error.incidentId
        });
    });

    it('should keep the code of core errors raised by handlers', async () => {
        const processor = runtime.createProcessor(service);
        failWith = new ContentionError('service:downstream', 5);

        const outcome = await processor.process(serializeEnvelope(userQuery('u1', 'hi')));

        assert.strictEqual(outcome.status, 'failed');
        if (outcome.status === 'failed') assert.strictEqual(outcome.error, failWith);
        const trail = await auditTrail();
        assert.deepStrictEqual(trail[1]?.details, { handler: 'docs-handler', error_code: 'APPEND_CONTENTION' });
    });

    it('should process messages that need no reply', async () => {
        const processor = runtime.createProcessor(service);
        replyWith = 'none';

        const outcome = await processor.process(serializeEnvelope(userQuery('u1', 'fyi')));

        assert.strictEqual(outcome.status, 'processed');
        if (outcome.status === 'processed') {
            assert.strictEqual(outcome.reply, null);
            assert.strictEqual(outcome.replyBody, null);
        }
        assert.deepStrictEqual((await auditTrail())[1]?.details, { handler: 'docs-handler' });
    });

    it('should authorize against a custom access rule', async () => {
        const processor = runtime.createProcessor(service, () => ({ action: 'read', resource: 'docs/index' }));

        const outcome = await processor.process(serializeEnvelope(userQuery('u1', 'list docs')));

        assert.strictEqual(outcome.status, 'processed');
        assert.deepStrictEqual((await auditTrail()).map(e => e.resource), ['docs/index', 'docs/index']);
    });

    it('should fail without auditing when the access rule throws', async () => {
        const processor = runtime.createProcessor(service, () => {
            throw new TypeError('payload.channel is not a string');
        });

        const outcome = await processor.process(serializeEnvelope(userQuery('u1', 'hi')));

        assert.strictEqual(outcome.status, 'failed');
        if (outcome.status === 'failed') {
            assert.ok(outcome.error instanceof InternalSystemError);
            assert.strictEqual(outcome.error.publicMessage, 'An internal system error occurred (MessageProcessor:AccessRule)');
        }
        assert.strictEqual(handled.length, 0);
        assert.strictEqual(store.size(), 0);
    });

    it('should run hooks and record lifecycle events', async () => {
        const processor = runtime.createProcessor(service);

        await processor.start();
        await processor.stop();

        assert.deepStrictEqual(hooks, ['startup', 'shutdown']);
        const trail = await auditTrail();
        assert.deepStrictEqual(trail.map(e => [e.action, e.eventType, e.resource]), [
            ['service_started', 'service_lifecycle', 'services/docs-api'],
            ['service_stopped', 'service_lifecycle', 'services/docs-api']
        ]);
        assert.deepStrictEqual(trail[0]?.details, { handler: 'docs-handler' });
        assert.strictEqual((await runtime.chain.verify(STREAM)).valid, true);
    });

    describe('createTrustRuntime', () => {
        it('should leave the registry out when none is configured', () => {
            assert.strictEqual(runtime.registry, null);
        });

        it('should build a registry client over a supplied transport', () => {
            const transport: RegistryTransport = {
                register: async () => ({ instanceId: 'inst-1' }),
                heartbeat: async () => undefined,
                deregister: async () => undefined,
                discover: async () => []
            };
            const withRegistry = createTrustRuntime(createCoreConfig({ service: { name: 'docs-api' } }), {
                identitySource: new StaticIdentitySource({ actors: {}, roles: {} }),
                auditStore: new InMemoryAuditStore(),
                registryTransport: transport
            });

            assert.ok(withRegistry.registry instanceof RegistrationClient);
        });

        it('should build Postgres adapters in the configured schemas', async () => {
            const db = new FakeDatabase();
            const { database } = createCoreConfig({
                service: { name: 'docs-api' },
                database: {
                    host: 'localhost',
                    port: 5432,
                    user: 'trust',
                    password: 'test-secret',
                    database: 'trust',
                    auditSchema: 'audit_eu',
                    iamSchema: 'iam_eu'
                }
            });
            assert.ok(database);

            const adapters = createPgAdapters(db, database);
            createTrustRuntime(createCoreConfig({ service: { name: 'docs-api' } }), adapters);
            await adapters.auditStore.getTip(STREAM);
            await adapters.identitySource.resolveRoles('u1', new AbortController().signal);

            assert.match(db.queries[0]?.text ?? '', /FROM "audit_eu"\.audit_chain_state/);
            assert.match(db.queries[1]?.text ?? '', /FROM "iam_eu"\.actors a/);
        });

        it('should build an HTTP registry client from the configured url', () => {
            const withUrl = createTrustRuntime(
                createCoreConfig({ service: { name: 'docs-api' }, registry: { url: 'http://registry.local:7000' } }),
                { identitySource: new StaticIdentitySource({ actors: {}, roles: {} }), auditStore: new InMemoryAuditStore() }
            );

            assert.ok(withUrl.registry instanceof RegistrationClient);
        });
    });
});
