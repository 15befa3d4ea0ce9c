import crypto from 'crypto';
import { EnvelopeSchema } from './schema.js';
import type {
    Actor,
    AiContext,
    AuthContext,
    Envelope,
    EnvelopeHeader,
    EnvelopeOf,
    MessageType,
    PayloadOf
} from './types.js';
import { validate } from '../validation/zod-middleware.js';
import { canonicalize, deepFreeze, sha256Hex } from '../canonical/json.js';

export interface CreateEnvelopeInput<K extends MessageType> {
    readonly sourceService: string;
    readonly actor: Actor;
    readonly authContext: AuthContext;
    readonly messageType: K;
    readonly payload: PayloadOf<K>;
    readonly aiContext?: AiContext;
}

export interface CreateReplyInput<K extends MessageType> {
    readonly sourceService: string;
    /** The principal producing the reply, usually the responding service. */
    readonly actor: Actor;
    readonly messageType: K;
    readonly payload: PayloadOf<K>;
    /** Defaults to the original's auth context (the reply acts on that request). */
    readonly authContext?: AuthContext;
    readonly aiContext?: AiContext;
}

export interface CreateChildInput<K extends MessageType> {
    readonly sourceService: string;
    readonly messageType: K;
    readonly payload: PayloadOf<K>;
    readonly aiContext?: AiContext;
}

interface Lineage {
    readonly causalityId?: string;
    readonly parentMessageId?: string;
}

function build<K extends MessageType>(input: CreateEnvelopeInput<K>, lineage: Lineage): EnvelopeOf<K> {
    const messageId = crypto.randomUUID();

    const candidate: EnvelopeOf<K> = {
        version: 'v1',
        messageId,
        causalityId: lineage.causalityId ?? messageId,
        ...(lineage.parentMessageId !== undefined ? { parentMessageId: lineage.parentMessageId } : {}),
        messageType: input.messageType,
        sourceService: input.sourceService,
        actor: input.actor,
        authContext: input.authContext,
        ...(input.aiContext !== undefined ? { aiContext: input.aiContext } : {}),
        payload: input.payload,
        createdAt: new Date().toISOString()
    };

    // Hard rejection at the boundary: the payload must match its type's schema.
    validate(EnvelopeSchema, candidate, `Envelope:create:${input.messageType}`);

    // Detach from caller-owned objects before freezing.
    return deepFreeze(structuredClone(candidate));
}

/**
 * Creates a new request envelope. causalityId equals the new messageId.
 */
export function createEnvelope<K extends MessageType>(input: CreateEnvelopeInput<K>): EnvelopeOf<K> {
    return build(input, {});
}

/**
 * Creates a reply. The original is never touched; the reply shares its
 * causalityId and records the original as its parent.
 */
export function createReply<K extends MessageType>(original: EnvelopeHeader, input: CreateReplyInput<K>): EnvelopeOf<K> {
    return build({
        sourceService: input.sourceService,
        actor: input.actor,
        authContext: input.authContext ?? original.authContext,
        messageType: input.messageType,
        payload: input.payload,
        aiContext: input.aiContext
    }, {
        causalityId: original.causalityId,
        parentMessageId: original.messageId
    });
}

/**
 * Creates a sub-request on behalf of the original's actor, keeping the
 * causality chain and the original's auth context.
 */
export function createChild<K extends MessageType>(original: EnvelopeHeader, input: CreateChildInput<K>): EnvelopeOf<K> {
    return build({
        sourceService: input.sourceService,
        actor: original.actor,
        authContext: original.authContext,
        messageType: input.messageType,
        payload: input.payload,
        aiContext: input.aiContext
    }, {
        causalityId: original.causalityId,
        parentMessageId: original.messageId
    });
}

/**
 * Validates an untrusted value as an envelope.
 * @throws SchemaError on missing identity/auth fields, unknown messageType or
 * a payload that does not match the type's schema.
 */
export function validateEnvelope(candidate: unknown): Envelope {
    return deepFreeze(validate(EnvelopeSchema, candidate, 'Envelope'));
}

/**
 * SHA-256 of the canonical payload, for audit details.
 */
export function payloadHash(envelope: Envelope): string {
    return sha256Hex(canonicalize(envelope.payload));
}
