import type { EnvelopeHeader } from '../envelope/types.js';
import type { AuditEventEmitter } from '../audit/emitter.js';
import type { AuthorizeOptions, RbacDecisionEngine } from './engine.js';
import type { PolicyDecision } from './decision.js';
import { AuthorizationDenied, IdentityResolutionError } from '../errors/coreErrors.js';

/**
 * Authorizes the actor of an envelope and records every decision, ALLOW or
 * DENY, before the caller acts on it.
 */
export class RbacEnforcer {
    constructor(
        private readonly engine: RbacDecisionEngine,
        private readonly emitter: AuditEventEmitter
    ) { }

    async check(envelope: EnvelopeHeader, action: string, resource: string, options: AuthorizeOptions = {}): Promise<PolicyDecision> {
        const decision = await this.engine.authorize(envelope.actor, action, resource, options);
        await this.emitter.logAuthorization(envelope, decision);
        return decision;
    }

    /**
     * @throws AuthorizationDenied for any DENY, with the identity failure as cause where there was one
     */
    async enforce(envelope: EnvelopeHeader, action: string, resource: string, options: AuthorizeOptions = {}): Promise<PolicyDecision> {
        const decision = await this.check(envelope, action, resource, options);

        if (decision.effect === 'DENY') {
            const cause = decision.failure
                ? new IdentityResolutionError(decision.actorId, decision.failure.reason)
                : undefined;
            throw new AuthorizationDenied(decision, cause ? { cause } : undefined);
        }

        return decision;
    }
}
