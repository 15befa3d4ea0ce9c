import type { Envelope, EnvelopeOf, MessageType, PayloadOf, AiContext } from '../envelope/types.js';
import type { PolicyDecision } from '../rbac/decision.js';
import type { Logger } from '../logging/logger.js';

export interface ReplyInput<K extends MessageType> {
    readonly messageType: K;
    readonly payload: PayloadOf<K>;
    readonly aiContext?: AiContext;
}

export interface HandlerContext {
    readonly decision: PolicyDecision;
    readonly logger: Logger;
    /** Builds a reply from this service to the message being handled. */
    reply<K extends MessageType>(input: ReplyInput<K>): EnvelopeOf<K>;
}

/**
 * Business logic of a service. Runs only for valid, authorized envelopes.
 * Resolves to a reply envelope, or null when there is nothing to send back.
 */
export interface MessageHandler {
    readonly name: string;
    handle(envelope: Envelope, context: HandlerContext): Promise<Envelope | null>;
}

export interface StartupHook {
    onStartup(): Promise<void>;
}

export interface ShutdownHook {
    onShutdown(): Promise<void>;
}

export type Service = MessageHandler & Partial<StartupHook & ShutdownHook>;

/** The (action, resource) pair an envelope is authorized against. */
export interface AccessRequest {
    readonly action: string;
    readonly resource: string;
}

export type AccessResolver = (envelope: Envelope) => AccessRequest;
