/**
 * Message Envelope (v1)
 * The unit every service exchanges. Immutable after creation; a reply is a
 * new envelope sharing the original's causalityId.
 */

import type { MessageType, PayloadOf } from './schema.js';
export type { MessageType, PayloadOf };

export type ActorKind = 'user' | 'service' | 'agent';

export interface Actor {
    readonly id: string;
    readonly kind: ActorKind;
    readonly displayName?: string;
}

/**
 * Claims asserted for a message. Opaque beyond what RBAC and stream
 * partitioning need.
 */
export interface AuthContext {
    readonly subject: string;
    readonly mechanism: string;      // e.g. 'oidc', 'service_token', 'mtls'
    readonly sessionRef?: string;
    readonly tenantId?: string;
    readonly scopes?: readonly string[];
}

/**
 * Present only when a model invocation produced or mediated the message.
 * Traceability only; never consulted for authorization.
 */
export interface AiContext {
    readonly modelId: string;
    readonly invocationId: string;
    readonly provider?: string;
}

export interface EnvelopeHeader {
    readonly version: 'v1';
    readonly messageId: string;
    readonly causalityId: string;
    readonly parentMessageId?: string;
    readonly messageType: MessageType;
    readonly sourceService: string;
    readonly actor: Actor;
    readonly authContext: AuthContext;
    readonly aiContext?: AiContext;
    readonly createdAt: string;     // ISO-8601
}

export type EnvelopeOf<K extends MessageType> = EnvelopeHeader & {
    readonly messageType: K;
    readonly payload: Readonly<PayloadOf<K>>;
};

export type Envelope = { [K in MessageType]: EnvelopeOf<K> }[MessageType];
