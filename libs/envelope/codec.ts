import { EnvelopeWireSchema, type EnvelopeWire } from './schema.js';
import type { Envelope } from './types.js';
import { validateEnvelope } from './envelope.js';
import { validate } from '../validation/zod-middleware.js';
import { SchemaError } from '../errors/coreErrors.js';

/**
 * Envelope wire codec.
 * Maps between the in-memory shape and the snake_case wire shape. Decoding
 * always validates; a decoded envelope equals the encoded one field by field.
 */

export function toWire(envelope: Envelope): EnvelopeWire {
    const { actor, authContext: auth, aiContext: ai } = envelope;

    return {
        version: envelope.version,
        message_id: envelope.messageId,
        causality_id: envelope.causalityId,
        ...(envelope.parentMessageId !== undefined ? { parent_message_id: envelope.parentMessageId } : {}),
        message_type: envelope.messageType,
        source_service: envelope.sourceService,
        actor: {
            id: actor.id,
            kind: actor.kind,
            ...(actor.displayName !== undefined ? { display_name: actor.displayName } : {})
        },
        auth_context: {
            subject: auth.subject,
            mechanism: auth.mechanism,
            ...(auth.sessionRef !== undefined ? { session_ref: auth.sessionRef } : {}),
            ...(auth.tenantId !== undefined ? { tenant_id: auth.tenantId } : {}),
            ...(auth.scopes !== undefined ? { scopes: [...auth.scopes] } : {})
        },
        ...(ai !== undefined ? {
            ai_context: {
                model_id: ai.modelId,
                invocation_id: ai.invocationId,
                ...(ai.provider !== undefined ? { provider: ai.provider } : {})
            }
        } : {}),
        payload: { ...envelope.payload },
        created_at: envelope.createdAt
    };
}

export function fromWire(wire: EnvelopeWire): Envelope {
    const { actor, auth_context: auth, ai_context: ai } = wire;

    return validateEnvelope({
        version: wire.version,
        messageId: wire.message_id,
        causalityId: wire.causality_id,
        ...(wire.parent_message_id !== undefined ? { parentMessageId: wire.parent_message_id } : {}),
        messageType: wire.message_type,
        sourceService: wire.source_service,
        actor: {
            id: actor.id,
            kind: actor.kind,
            ...(actor.display_name !== undefined ? { displayName: actor.display_name } : {})
        },
        authContext: {
            subject: auth.subject,
            mechanism: auth.mechanism,
            ...(auth.session_ref !== undefined ? { sessionRef: auth.session_ref } : {}),
            ...(auth.tenant_id !== undefined ? { tenantId: auth.tenant_id } : {}),
            ...(auth.scopes !== undefined ? { scopes: auth.scopes } : {})
        },
        ...(ai !== undefined ? {
            aiContext: {
                modelId: ai.model_id,
                invocationId: ai.invocation_id,
                ...(ai.provider !== undefined ? { provider: ai.provider } : {})
            }
        } : {}),
        payload: wire.payload,
        createdAt: wire.created_at
    });
}

export function serializeEnvelope(envelope: Envelope): string {
    return JSON.stringify(toWire(envelope));
}

/**
 * Decodes a message body.
 * @throws SchemaError for malformed JSON or any schema violation
 */
export function deserializeEnvelope(body: string | Uint8Array): Envelope {
    const text = typeof body === 'string' ? body : Buffer.from(body).toString('utf8');

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        throw new SchemaError('Envelope:wire', [{
            path: '',
            message: `Malformed JSON: ${err instanceof Error ? err.message : String(err)}`
        }]);
    }

    return fromWire(validate(EnvelopeWireSchema, parsed, 'Envelope:wire'));
}
