/**
 * Unit Tests: AuditEventEmitter
 *
 * @see libs/audit/emitter.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AuditEventEmitter, type AuditEmitterOptions } from '../../libs/audit/emitter.js';
import { AuditChain } from '../../libs/audit/chain.js';
import { InMemoryAuditStore, type AuditStore } from '../../libs/audit/store.js';
import { evaluatePolicy, identityFailureDecision } from '../../libs/rbac/decision.js';
import { ContentionError } from '../../libs/errors/coreErrors.js';
import { sha256Hex } from '../../libs/canonical/json.js';
import { allow, CHAIN_OPTIONS, userQuery, userRequest } from '../helpers/fixtures.js';

function emitterWith(audit: Partial<AuditEmitterOptions['audit']> = {}, store: AuditStore = new InMemoryAuditStore()) {
    const chain = new AuditChain(store, CHAIN_OPTIONS);
    const emitter = new AuditEventEmitter(chain, {
        serviceName: 'docs-api',
        audit: {
            streamPartitioning: 'service',
            includePromptText: false,
            includeResponseText: false,
            hashAlgorithm: 'sha256',
            ...audit
        }
    });
    return { chain, emitter };
}

describe('AuditEventEmitter', () => {
    describe('streamFor', () => {
        it('should partition by service', () => {
            const { emitter } = emitterWith();
            assert.strictEqual(emitter.streamFor(userQuery('u1', 'hi')), 'service:docs-api');
        });

        it('should partition by tenant', () => {
            const { emitter } = emitterWith({ streamPartitioning: 'tenant' });
            assert.strictEqual(emitter.streamFor(userRequest('u1', 'read', 'docs/a', 'acme')), 'tenant:acme');
            assert.strictEqual(emitter.streamFor(userRequest('u1', 'read', 'docs/a')), 'untenanted');
        });

        it('should keep a tenant named default apart from untenanted envelopes', () => {
            const { emitter } = emitterWith({ streamPartitioning: 'tenant' });
            const named = emitter.streamFor(userRequest('u1', 'read', 'docs/a', 'default'));

            assert.strictEqual(named, 'tenant:default');
            assert.notStrictEqual(named, emitter.streamFor(userRequest('u1', 'read', 'docs/a')));
        });

        it('should use one stream when global', () => {
            const { emitter } = emitterWith({ streamPartitioning: 'global' });
            assert.strictEqual(emitter.streamFor(userQuery('u1', 'hi')), 'global');
        });
    });

    it('should record a decision as an authorization event', async () => {
        const { emitter } = emitterWith();
        const envelope = userRequest('u1', 'read', 'docs/a');
        const decision = evaluatePolicy({
            actorId: 'u1',
            action: 'read',
            resource: 'docs/a',
            roles: ['viewer'],
            permissionsByRole: new Map([['viewer', [allow('read', 'docs/*')]]])
        });

        const event = await emitter.logAuthorization(envelope, decision);

        assert.strictEqual(event.eventType, 'authorization');
        assert.strictEqual(event.outcome, 'ALLOW');
        assert.strictEqual(event.sourceService, 'docs-api');
        assert.deepStrictEqual(event.actor, { id: 'u1', kind: 'user' });
        assert.deepStrictEqual(event.details, {
            decision: 'ALLOW',
            reason: 'allowed by viewer:read:docs/*',
            roles: ['viewer'],
            matched_rule: { role: 'viewer', action: 'read', resource_pattern: 'docs/*', effect: 'ALLOW' }
        });
    });

    it('should record identity failures on DENY', async () => {
        const { emitter } = emitterWith();
        const envelope = userRequest('ghost', 'read', 'docs/a');

        const event = await emitter.logAuthorization(envelope, identityFailureDecision('ghost', 'read', 'docs/a', 'TIMEOUT'));

        assert.strictEqual(event.outcome, 'DENY');
        assert.deepStrictEqual(event.details.failure, { code: 'IDENTITY_RESOLUTION_FAILED', reason: 'TIMEOUT' });
        assert.strictEqual(event.details.matched_rule, null);
    });

    it('should keep decision fields over caller details', async () => {
        const { emitter } = emitterWith();
        const envelope = userRequest('u1', 'write', 'docs/a');
        const decision = identityFailureDecision('u1', 'write', 'docs/a', 'UNKNOWN_ACTOR');

        const event = await emitter.logFromEnvelope(envelope, decision, 'write', 'docs/a', { decision: 'ALLOW', ticket: 'T-1' });

        assert.strictEqual(event.details.decision, 'DENY');
        assert.strictEqual(event.details.ticket, 'T-1');
    });

    it('should reference the envelope that caused the event', async () => {
        const { emitter } = emitterWith();
        const envelope = userRequest('u1', 'read', 'docs/a');

        const event = await emitter.logFromEnvelope(envelope, { eventType: 'data_access', outcome: 'ALLOW' }, 'read', 'docs/a', { bytes: 120 });

        assert.deepStrictEqual(event.envelopeRef, { messageId: envelope.messageId, causalityId: envelope.causalityId });
        assert.deepStrictEqual(event.details, { bytes: 120 });
        assert.strictEqual(event.eventType, 'data_access');
    });

    it('should record authentication attempts', async () => {
        const { emitter } = emitterWith();
        const event = await emitter.logAuthentication(userQuery('u1', 'hi'), 'oidc', 'DENY', { error: 'expired' });

        assert.strictEqual(event.action, 'auth_oidc');
        assert.strictEqual(event.resource, 'identity');
        assert.strictEqual(event.eventType, 'authentication');
        assert.strictEqual(event.outcome, 'DENY');
    });

    it('should record system events under the service identity', async () => {
        const { emitter } = emitterWith();
        const event = await emitter.logSystem('service_started', {
            eventType: 'service_lifecycle',
            resource: 'services/docs-api',
            details: { version: '1.2.0' }
        });

        assert.deepStrictEqual(event.actor, { id: 'docs-api', kind: 'service' });
        assert.strictEqual(event.eventType, 'service_lifecycle');
        assert.strictEqual(event.outcome, 'ALLOW');
        assert.strictEqual(event.resource, 'services/docs-api');
        assert.strictEqual(event.envelopeRef.causalityId, event.envelopeRef.messageId);
        assert.deepStrictEqual(event.details, { version: '1.2.0' });
    });

    it('should default system events to an empty resource', async () => {
        const { emitter } = emitterWith();
        const event = await emitter.logSystem('config_reloaded');

        assert.strictEqual(event.resource, '');
        assert.strictEqual(event.eventType, 'system_event');
    });

    it('should hash model prompts and responses', async () => {
        const { emitter } = emitterWith();
        const event = await emitter.logAiInteraction(userQuery('u1', 'hi'), {
            modelId: 'model-a',
            provider: 'local',
            promptText: 'summarize order 42',
            responseText: 'order 42 shipped',
            inputTokens: 10,
            outputTokens: 4,
            latencyMs: 80
        });

        assert.strictEqual(event.action, 'ai_invocation');
        assert.strictEqual(event.resource, 'local/model-a');
        assert.strictEqual(event.eventType, 'ai_interaction');
        assert.deepStrictEqual(event.details, {
            model_id: 'model-a',
            provider: 'local',
            prompt_hash: sha256Hex('summarize order 42'),
            response_hash: sha256Hex('order 42 shipped'),
            input_tokens: 10,
            output_tokens: 4,
            total_tokens: 14,
            latency_ms: 80
        });
    });

    it('should include raw text only when configured', async () => {
        const { emitter } = emitterWith({ includePromptText: true });
        const event = await emitter.logAiInteraction(userQuery('u1', 'hi'), {
            modelId: 'model-a',
            provider: 'local',
            promptText: 'summarize order 42',
            responseText: 'order 42 shipped',
            inputTokens: 10,
            outputTokens: 4
        });

        assert.strictEqual(event.details.prompt_text, 'summarize order 42');
        assert.strictEqual('response_text' in event.details, false);
        assert.strictEqual('latency_ms' in event.details, false);
    });

    it('should append to one verifiable stream', async () => {
        const { chain, emitter } = emitterWith();
        await emitter.logSystem('service_started');
        await emitter.logAuthentication(userQuery('u1', 'hi'), 'oidc', 'ALLOW');
        await emitter.logSystem('service_stopped');

        const result = await chain.verify('service:docs-api');
        assert.strictEqual(result.valid, true);
        if (result.valid) assert.strictEqual(result.checked, 3);
    });

    it('should propagate append failures', async () => {
        const stuck: AuditStore = {
            getTip: async () => null,
            compareAndAppend: async () => false,
            readRange: async () => []
        };
        const { emitter } = emitterWith({}, stuck);

        await assert.rejects(emitter.logSystem('service_started'), ContentionError);
    });
});
