/**
 * Message processing pipeline.
 *
 *   raw -> deserialize + validate -> access rule -> RBAC (audited)
 *       -> handler -> outcome audited -> reply
 *
 * Malformed input is rejected before anything else runs. Denials are
 * audited and never reach the handler. Handler failures are audited as
 * ERROR and returned sanitized.
 */

import { deserializeEnvelope, serializeEnvelope } from '../envelope/codec.js';
import { createReply } from '../envelope/envelope.js';
import type { Envelope, EnvelopeOf, MessageType } from '../envelope/types.js';
import type { RbacEnforcer } from '../rbac/enforcer.js';
import type { PolicyDecision } from '../rbac/decision.js';
import type { AuditEventEmitter } from '../audit/emitter.js';
import type { AccessRequest, AccessResolver, HandlerContext, ReplyInput, Service } from './types.js';
import { defaultAccessRule } from './accessRules.js';
import { AuthorizationDenied, SchemaError, type CoreError } from '../errors/coreErrors.js';
import { ErrorSanitizer, InternalSystemError } from '../errors/sanitizer.js';
import { getEnvelopeLogger, logger } from '../logging/logger.js';

const componentLog = logger.child({ component: 'MessageProcessor' });

export type ProcessOutcome =
    | { status: 'processed'; envelope: Envelope; decision: PolicyDecision; reply: Envelope | null; replyBody: string | null }
    | { status: 'rejected'; error: SchemaError | AuthorizationDenied }
    | { status: 'failed'; error: CoreError | InternalSystemError };

export interface MessageProcessorDeps {
    readonly serviceName: string;
    readonly service: Service;
    readonly enforcer: RbacEnforcer;
    readonly emitter: AuditEventEmitter;
    readonly accessRule?: AccessResolver;
}

export class MessageProcessor {
    private readonly accessRule: AccessResolver;

    constructor(private readonly deps: MessageProcessorDeps) {
        this.accessRule = deps.accessRule ?? defaultAccessRule;
    }

    async start(): Promise<void> {
        await this.deps.service.onStartup?.();
        await this.deps.emitter.logSystem('service_started', {
            eventType: 'service_lifecycle',
            resource: `services/${this.deps.serviceName}`,
            details: { handler: this.deps.service.name }
        });
        componentLog.info({ serviceName: this.deps.serviceName, handler: this.deps.service.name }, 'Message processor started');
    }

    async stop(): Promise<void> {
        await this.deps.service.onShutdown?.();
        await this.deps.emitter.logSystem('service_stopped', {
            eventType: 'service_lifecycle',
            resource: `services/${this.deps.serviceName}`
        });
        componentLog.info({ serviceName: this.deps.serviceName }, 'Message processor stopped');
    }

    async process(raw: string | Uint8Array): Promise<ProcessOutcome> {
        let envelope: Envelope;
        try {
            envelope = deserializeEnvelope(raw);
        } catch (err) {
            if (err instanceof SchemaError) {
                componentLog.warn({ context: err.context, issues: err.issues }, 'Rejected malformed message');
                return { status: 'rejected', error: err };
            }
            return { status: 'failed', error: ErrorSanitizer.sanitize(err, 'MessageProcessor:Deserialize') };
        }

        const log = getEnvelopeLogger(envelope);
        let access: AccessRequest;
        try {
            access = this.accessRule(envelope);
        } catch (err) {
            return { status: 'failed', error: ErrorSanitizer.sanitize(err, 'MessageProcessor:AccessRule') };
        }
        const { action, resource } = access;

        let decision: PolicyDecision;
        try {
            decision = await this.deps.enforcer.enforce(envelope, action, resource);
        } catch (err) {
            if (err instanceof AuthorizationDenied) {
                log.warn({ action, resource, reason: err.decision.reason }, 'Message denied');
                return { status: 'rejected', error: err };
            }
            return { status: 'failed', error: ErrorSanitizer.sanitize(err, 'MessageProcessor:Authorize') };
        }

        const context: HandlerContext = {
            decision,
            logger: log,
            reply: <K extends MessageType>(input: ReplyInput<K>): EnvelopeOf<K> => createReply(envelope, {
                sourceService: this.deps.serviceName,
                actor: { id: this.deps.serviceName, kind: 'service' },
                messageType: input.messageType,
                payload: input.payload,
                ...(input.aiContext !== undefined ? { aiContext: input.aiContext } : {})
            })
        };

        let reply: Envelope | null;
        try {
            reply = await this.deps.service.handle(envelope, context);
        } catch (err) {
            const error = ErrorSanitizer.sanitize(err, `Handler:${this.deps.service.name}`);
            try {
                await this.deps.emitter.logFromEnvelope(envelope, { eventType: 'error', outcome: 'ERROR' }, action, resource, {
                    handler: this.deps.service.name,
                    error_code: error instanceof InternalSystemError ? 'INTERNAL' : error.code,
                    ...(error instanceof InternalSystemError ? { incident_id: error.incidentId } : {})
                });
            } catch (auditErr) {
                return { status: 'failed', error: ErrorSanitizer.sanitize(auditErr, 'MessageProcessor:AuditHandlerFailure') };
            }
            return { status: 'failed', error };
        }

        try {
            await this.deps.emitter.logFromEnvelope(envelope, { eventType: 'data_access', outcome: 'ALLOW' }, action, resource, {
                handler: this.deps.service.name,
                ...(reply ? { reply_message_id: reply.messageId } : {})
            });
        } catch (err) {
            return { status: 'failed', error: ErrorSanitizer.sanitize(err, 'MessageProcessor:AuditOutcome') };
        }

        log.info({ action, resource, replied: reply !== null }, 'Message processed');

        return {
            status: 'processed',
            envelope,
            decision,
            reply,
            replyBody: reply ? serializeEnvelope(reply) : null
        };
    }
}
