/**
 * Audit Event Schema (v1)
 *
 * Each event is a node in a per-stream hash chain:
 *   hash = H(canonicalJson(persisted fields except hash and prev_hash) || prev_hash)
 * Events are never updated or deleted once appended.
 */

import { z } from 'zod';
import type { ActorKind } from '../envelope/types.js';
import type { JsonObject, JsonValue } from '../canonical/json.js';

export const AuditEventTypeSchema = z.enum([
    'data_access',
    'data_modification',
    'authentication',
    'authorization',
    'ai_interaction',
    'system_event',
    'configuration_change',
    'service_lifecycle',
    'error'
]);

export type AuditEventType = z.infer<typeof AuditEventTypeSchema>;

export const AuditOutcomeSchema = z.enum(['ALLOW', 'DENY', 'ERROR']);
export type AuditOutcome = z.infer<typeof AuditOutcomeSchema>;

export interface AuditActor {
    readonly id: string;
    readonly kind: ActorKind;
}

export interface EnvelopeRef {
    readonly messageId: string;
    readonly causalityId: string;
}

/**
 * Caller-supplied content of an event. The chain assigns identity, position
 * and integrity fields.
 */
export interface AuditEventFields {
    readonly actor: AuditActor;
    readonly action: string;
    readonly resource: string;
    readonly outcome: AuditOutcome;
    readonly eventType: AuditEventType;
    readonly envelopeRef: EnvelopeRef;
    readonly sourceService: string;
    readonly details: JsonObject;
}

export interface AuditEvent extends AuditEventFields {
    readonly eventId: string;
    readonly streamId: string;
    readonly sequence: number;      // 0-based position in the stream
    readonly prevHash: string;
    readonly hash: string;
    readonly timestamp: string;     // ISO-8601
}

export type UnsealedAuditEvent = Omit<AuditEvent, 'hash'>;

// --- Persisted shape (snake_case) ---

const HexSchema = z.string().regex(/^[0-9a-f]+$/);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema)
]));

export const AuditEventRecordSchema = z.object({
    event_id: z.string().uuid(),
    stream_id: z.string().min(1),
    sequence: z.number().int().nonnegative(),
    prev_hash: HexSchema,
    hash: HexSchema,
    timestamp: z.string().datetime(),
    actor: z.object({
        id: z.string().min(1),
        kind: z.enum(['user', 'service', 'agent'])
    }).strict(),
    action: z.string().min(1),
    resource: z.string(),
    outcome: AuditOutcomeSchema,
    event_type: AuditEventTypeSchema,
    envelope_ref: z.object({
        message_id: z.string().uuid(),
        causality_id: z.string().uuid()
    }).strict(),
    source_service: z.string().min(1),
    details: z.record(JsonValueSchema)
}).strict();

export type AuditEventRecord = z.infer<typeof AuditEventRecordSchema>;

/**
 * The hashed content: every persisted field except hash and prev_hash.
 */
export function hashedContentOf(event: UnsealedAuditEvent): Omit<AuditEventRecord, 'hash' | 'prev_hash'> {
    return {
        event_id: event.eventId,
        stream_id: event.streamId,
        sequence: event.sequence,
        timestamp: event.timestamp,
        actor: { id: event.actor.id, kind: event.actor.kind },
        action: event.action,
        resource: event.resource,
        outcome: event.outcome,
        event_type: event.eventType,
        envelope_ref: {
            message_id: event.envelopeRef.messageId,
            causality_id: event.envelopeRef.causalityId
        },
        source_service: event.sourceService,
        details: event.details
    };
}

export function toRecord(event: AuditEvent): AuditEventRecord {
    return {
        ...hashedContentOf(event),
        prev_hash: event.prevHash,
        hash: event.hash
    };
}

export function fromRecord(record: AuditEventRecord): AuditEvent {
    return {
        eventId: record.event_id,
        streamId: record.stream_id,
        sequence: record.sequence,
        prevHash: record.prev_hash,
        hash: record.hash,
        timestamp: record.timestamp,
        actor: { id: record.actor.id, kind: record.actor.kind },
        action: record.action,
        resource: record.resource,
        outcome: record.outcome,
        eventType: record.event_type,
        envelopeRef: {
            messageId: record.envelope_ref.message_id,
            causalityId: record.envelope_ref.causality_id
        },
        sourceService: record.source_service,
        details: record.details
    };
}
