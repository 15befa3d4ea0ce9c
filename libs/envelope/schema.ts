import { z } from 'zod';

/**
 * Envelope schemas (v1).
 * Every payload is a tagged variant keyed by messageType; unknown types and
 * unknown fields are rejected.
 */

const Sha256HexSchema = z.string().regex(/^[a-f0-9]{64}$/);
const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// --- Payload variants ---

export const UserQueryPayloadSchema = z.object({
    text: z.string().min(1).max(32_000),
    channel: z.string().min(1).optional(),
}).strict();

export const UserReplyPayloadSchema = z.object({
    text: z.string().max(64_000),
    citations: z.array(z.string().min(1)).optional(),
}).strict();

export const ResourceRequestPayloadSchema = z.object({
    action: z.string().min(1).max(64),
    resource: z.string().min(1).max(512),
    params: z.record(ScalarSchema).optional(),
}).strict();

export const AlertRaisedPayloadSchema = z.object({
    alertId: z.string().min(1),
    source: z.string().min(1),
    severity: z.enum(['low', 'medium', 'high', 'critical']),
    summary: z.string().min(1).max(4_000),
    observedAt: z.string().datetime(),
}).strict();

export const AiCompletionPayloadSchema = z.object({
    promptHash: Sha256HexSchema,
    responseHash: Sha256HexSchema,
    inputTokens: z.number().int().nonnegative(),
    outputTokens: z.number().int().nonnegative(),
    latencyMs: z.number().int().nonnegative().optional(),
}).strict();

export const SystemEventPayloadSchema = z.object({
    event: z.string().min(1),
    details: z.record(ScalarSchema).optional(),
}).strict();

export const MessageTypeSchema = z.enum([
    'user.query',
    'user.reply',
    'resource.request',
    'alert.raised',
    'ai.completion',
    'system.event',
]);

export type MessageType = z.infer<typeof MessageTypeSchema>;

export const MESSAGE_PAYLOAD_SCHEMAS = {
    'user.query': UserQueryPayloadSchema,
    'user.reply': UserReplyPayloadSchema,
    'resource.request': ResourceRequestPayloadSchema,
    'alert.raised': AlertRaisedPayloadSchema,
    'ai.completion': AiCompletionPayloadSchema,
    'system.event': SystemEventPayloadSchema,
} as const satisfies Record<MessageType, z.ZodTypeAny>;

export type PayloadOf<K extends MessageType> = z.infer<(typeof MESSAGE_PAYLOAD_SCHEMAS)[K]>;

// --- Context blocks ---

export const ActorSchema = z.object({
    id: z.string().min(1).max(256),
    kind: z.enum(['user', 'service', 'agent']),
    displayName: z.string().min(1).optional(),
}).strict();

export const AuthContextSchema = z.object({
    subject: z.string().min(1),
    mechanism: z.string().min(1),
    sessionRef: z.string().min(1).optional(),
    tenantId: z.string().min(1).max(64).optional(),
    scopes: z.array(z.string().min(1)).optional(),
}).strict();

export const AiContextSchema = z.object({
    modelId: z.string().min(1),
    invocationId: z.string().min(1),
    provider: z.string().min(1).optional(),
}).strict();

// --- Envelope ---

const EnvelopeBaseSchema = z.object({
    version: z.literal('v1'),
    messageId: z.string().uuid(),
    causalityId: z.string().uuid(),
    parentMessageId: z.string().uuid().optional(),
    sourceService: z.string().min(1),
    actor: ActorSchema,
    authContext: AuthContextSchema,
    aiContext: AiContextSchema.optional(),
    createdAt: z.string().datetime(),
});

function variant<K extends MessageType>(messageType: K, payload: (typeof MESSAGE_PAYLOAD_SCHEMAS)[K]) {
    return EnvelopeBaseSchema.extend({
        messageType: z.literal(messageType),
        payload,
    }).strict();
}

export const EnvelopeSchema = z.discriminatedUnion('messageType', [
    variant('user.query', UserQueryPayloadSchema),
    variant('user.reply', UserReplyPayloadSchema),
    variant('resource.request', ResourceRequestPayloadSchema),
    variant('alert.raised', AlertRaisedPayloadSchema),
    variant('ai.completion', AiCompletionPayloadSchema),
    variant('system.event', SystemEventPayloadSchema),
]);

// --- Wire shape (snake_case) ---

export const EnvelopeWireSchema = z.object({
    version: z.literal('v1'),
    message_id: z.string(),
    causality_id: z.string(),
    parent_message_id: z.string().optional(),
    message_type: z.string(),
    source_service: z.string(),
    actor: z.object({
        id: z.string(),
        kind: z.string(),
        display_name: z.string().optional(),
    }).strict(),
    auth_context: z.object({
        subject: z.string(),
        mechanism: z.string(),
        session_ref: z.string().optional(),
        tenant_id: z.string().optional(),
        scopes: z.array(z.string()).optional(),
    }).strict(),
    ai_context: z.object({
        model_id: z.string(),
        invocation_id: z.string(),
        provider: z.string().optional(),
    }).strict().optional(),
    payload: z.record(z.unknown()),
    created_at: z.string(),
}).strict();

export type EnvelopeWire = z.infer<typeof EnvelopeWireSchema>;
