import type { Envelope } from '../envelope/types.js';
import type { AccessRequest } from './types.js';

/**
 * Default mapping from a message to the permission it needs.
 */
export function defaultAccessRule(envelope: Envelope): AccessRequest {
    switch (envelope.messageType) {
        case 'user.query':
            return { action: 'query', resource: `conversations/${envelope.payload.channel ?? 'default'}` };
        case 'user.reply':
            return { action: 'reply', resource: `conversations/${envelope.causalityId}` };
        case 'resource.request':
            return { action: envelope.payload.action, resource: envelope.payload.resource };
        case 'alert.raised':
            return { action: 'raise', resource: `alerts/${envelope.payload.source}` };
        case 'ai.completion':
            return { action: 'record', resource: `ai/${envelope.aiContext?.modelId ?? 'unknown'}` };
        case 'system.event':
            return { action: 'emit', resource: `system/${envelope.payload.event}` };
    }
}
