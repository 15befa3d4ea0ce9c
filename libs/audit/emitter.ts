/**
 * Audit Event Emitter
 * Turns envelopes and decisions into chain appends. Every event references
 * the envelope that caused it; events with no inbound message get a
 * system.event envelope from the service's own actor.
 */

import type { AuditConfig } from '../config/coreConfig.js';
import type { Envelope, EnvelopeHeader } from '../envelope/types.js';
import type { PolicyDecision } from '../rbac/decision.js';
import type { AuditEvent, AuditEventType, AuditOutcome } from './schema.js';
import type { AuditChain } from './chain.js';
import { createEnvelope } from '../envelope/envelope.js';
import { digestHex, type JsonObject } from '../canonical/json.js';
import { getEnvelopeLogger } from '../logging/logger.js';

export interface EventDescriptor {
    readonly eventType: AuditEventType;
    readonly outcome: AuditOutcome;
}

export type SystemEventType = 'system_event' | 'service_lifecycle' | 'configuration_change' | 'error';

export interface SystemEventOptions {
    readonly resource?: string;
    readonly outcome?: AuditOutcome;
    readonly eventType?: SystemEventType;
    readonly details?: JsonObject;
}

export interface AiInteraction {
    readonly modelId: string;
    readonly provider: string;
    readonly promptText: string;
    readonly responseText: string;
    readonly inputTokens: number;
    readonly outputTokens: number;
    readonly latencyMs?: number;
}

export interface AuditEmitterOptions {
    readonly serviceName: string;
    readonly audit: Pick<AuditConfig, 'streamPartitioning' | 'includePromptText' | 'includeResponseText' | 'hashAlgorithm'>;
}

function isDecision(value: PolicyDecision | EventDescriptor): value is PolicyDecision {
    return 'effect' in value;
}

function decisionDetails(decision: PolicyDecision): JsonObject {
    const rule = decision.matchedRule;
    return {
        decision: decision.effect,
        reason: decision.reason,
        roles: [...decision.roles],
        matched_rule: rule
            ? { role: rule.role, action: rule.action, resource_pattern: rule.resourcePattern, effect: rule.effect }
            : null,
        ...(decision.failure ? { failure: { code: decision.failure.code, reason: decision.failure.reason } } : {})
    };
}

export class AuditEventEmitter {
    constructor(
        private readonly chain: AuditChain,
        private readonly options: AuditEmitterOptions
    ) { }

    /**
     * Stream for an envelope under the configured partitioning key.
     */
    streamFor(envelope: EnvelopeHeader): string {
        switch (this.options.audit.streamPartitioning) {
            case 'service':
                return `service:${this.options.serviceName}`;
            case 'tenant': {
                // Tenant ids are never empty, so 'untenanted' cannot clash with a tenant stream.
                const tenantId = envelope.authContext.tenantId;
                return tenantId === undefined ? 'untenanted' : `tenant:${tenantId}`;
            }
            case 'global':
                return 'global';
        }
    }

    /**
     * Appends one event for an envelope. A PolicyDecision is recorded as an
     * authorization event whose outcome is the decision's effect.
     */
    async logFromEnvelope(
        envelope: EnvelopeHeader,
        decisionOrEvent: PolicyDecision | EventDescriptor,
        action: string,
        resource: string,
        details: JsonObject = {}
    ): Promise<AuditEvent> {
        const descriptor: EventDescriptor = isDecision(decisionOrEvent)
            ? { eventType: 'authorization', outcome: decisionOrEvent.effect }
            : decisionOrEvent;

        const merged: JsonObject = isDecision(decisionOrEvent)
            ? { ...details, ...decisionDetails(decisionOrEvent) }
            : details;

        const event = await this.chain.append(this.streamFor(envelope), {
            actor: { id: envelope.actor.id, kind: envelope.actor.kind },
            action,
            resource,
            outcome: descriptor.outcome,
            eventType: descriptor.eventType,
            envelopeRef: { messageId: envelope.messageId, causalityId: envelope.causalityId },
            sourceService: this.options.serviceName,
            details: merged
        });

        getEnvelopeLogger(envelope).info({
            streamId: event.streamId,
            sequence: event.sequence,
            auditEvent: event.eventType,
            outcome: event.outcome
        }, 'Audit event recorded');

        return event;
    }

    async logAuthorization(envelope: EnvelopeHeader, decision: PolicyDecision): Promise<AuditEvent> {
        return this.logFromEnvelope(envelope, decision, decision.action, decision.resource);
    }

    async logAuthentication(
        envelope: EnvelopeHeader,
        mechanism: string,
        outcome: AuditOutcome,
        details: JsonObject = {}
    ): Promise<AuditEvent> {
        return this.logFromEnvelope(envelope, { eventType: 'authentication', outcome }, `auth_${mechanism}`, 'identity', details);
    }

    /**
     * Service-level event (startup, shutdown, config change) with no inbound
     * message.
     */
    async logSystem(action: string, options: SystemEventOptions = {}): Promise<AuditEvent> {
        const envelope: Envelope = createEnvelope({
            sourceService: this.options.serviceName,
            actor: { id: this.options.serviceName, kind: 'service' },
            authContext: { subject: this.options.serviceName, mechanism: 'service_identity' },
            messageType: 'system.event',
            payload: { event: action }
        });

        return this.logFromEnvelope(
            envelope,
            { eventType: options.eventType ?? 'system_event', outcome: options.outcome ?? 'ALLOW' },
            action,
            options.resource ?? '',
            options.details ?? {}
        );
    }

    /**
     * Model invocation. Prompt and response are always hashed; raw text is
     * recorded only where the audit config allows it.
     */
    async logAiInteraction(envelope: EnvelopeHeader, interaction: AiInteraction): Promise<AuditEvent> {
        const { hashAlgorithm, includePromptText, includeResponseText } = this.options.audit;

        const details: JsonObject = {
            model_id: interaction.modelId,
            provider: interaction.provider,
            prompt_hash: digestHex(interaction.promptText, hashAlgorithm),
            response_hash: digestHex(interaction.responseText, hashAlgorithm),
            input_tokens: interaction.inputTokens,
            output_tokens: interaction.outputTokens,
            total_tokens: interaction.inputTokens + interaction.outputTokens,
            ...(interaction.latencyMs !== undefined ? { latency_ms: interaction.latencyMs } : {}),
            ...(includePromptText ? { prompt_text: interaction.promptText } : {}),
            ...(includeResponseText ? { response_text: interaction.responseText } : {})
        };

        return this.logFromEnvelope(
            envelope,
            { eventType: 'ai_interaction', outcome: 'ALLOW' },
            'ai_invocation',
            `${interaction.provider}/${interaction.modelId}`,
            details
        );
    }
}
