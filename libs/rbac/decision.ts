/**
 * RBAC policy evaluation.
 * Pure: the same role set, permission table and request always produce the
 * same decision. Nothing here performs I/O.
 */

import { z } from 'zod';
import { compareSpecificity, compilePattern } from './pattern.js';
import { deepFreeze } from '../canonical/json.js';
import type { IdentityResolutionReason } from '../errors/coreErrors.js';

export const NO_MATCHING_RULE = 'no matching rule';

export const PermissionSchema = z.object({
    action: z.string().min(1),
    resourcePattern: z.string().min(1),
    effect: z.enum(['ALLOW', 'DENY'])
}).strict();

export type PermissionEffect = z.infer<typeof PermissionSchema>['effect'];

export interface Permission {
    readonly action: string;
    readonly resourcePattern: string;
    readonly effect: PermissionEffect;
}

export interface MatchedRule extends Permission {
    readonly role: string;
}

export interface DecisionFailure {
    readonly code: 'IDENTITY_RESOLUTION_FAILED';
    readonly reason: IdentityResolutionReason;
}

export interface PolicyDecision {
    readonly effect: PermissionEffect;
    readonly actorId: string;
    readonly action: string;
    readonly resource: string;
    readonly roles: readonly string[];
    readonly matchedRule: MatchedRule | null;
    readonly reason: string;
    readonly failure?: DecisionFailure;
}

export interface PolicyInput {
    readonly actorId: string;
    readonly action: string;
    readonly resource: string;
    readonly roles: readonly string[];
    readonly permissionsByRole: ReadonlyMap<string, readonly Permission[]>;
}

function ruleKey(rule: MatchedRule): string {
    return `${rule.role}\u0000${rule.resourcePattern}\u0000${rule.effect}`;
}

function describeRule(rule: MatchedRule): string {
    return `${rule.role}:${rule.action}:${rule.resourcePattern}`;
}

/**
 * Selects the most specific matching rule. Among equally specific rules an
 * explicit DENY wins. No match is a DENY.
 */
export function evaluatePolicy(input: PolicyInput): PolicyDecision {
    const roles = [...new Set(input.roles)].sort();

    const candidates: MatchedRule[] = [];
    for (const role of roles) {
        for (const permission of input.permissionsByRole.get(role) ?? []) {
            if (permission.action !== input.action) continue;
            if (!compilePattern(permission.resourcePattern).matches(input.resource)) continue;
            candidates.push({ role, ...permission });
        }
    }

    if (candidates.length === 0) {
        const denied: PolicyDecision = {
            effect: 'DENY',
            actorId: input.actorId,
            action: input.action,
            resource: input.resource,
            roles,
            matchedRule: null,
            reason: NO_MATCHING_RULE
        };
        return deepFreeze(denied);
    }

    // Role order must not change the outcome.
    candidates.sort((a, b) => {
        const bySpecificity = compareSpecificity(
            compilePattern(a.resourcePattern).specificity,
            compilePattern(b.resourcePattern).specificity
        );
        if (bySpecificity !== 0) return bySpecificity;
        if (a.effect !== b.effect) return a.effect === 'DENY' ? -1 : 1;
        return ruleKey(a) < ruleKey(b) ? -1 : ruleKey(a) > ruleKey(b) ? 1 : 0;
    });

    const [winner] = candidates;
    if (winner === undefined) {
        throw new Error('unreachable: candidates is non-empty');
    }

    const decision: PolicyDecision = {
        effect: winner.effect,
        actorId: input.actorId,
        action: input.action,
        resource: input.resource,
        roles,
        matchedRule: winner,
        reason: `${winner.effect === 'ALLOW' ? 'allowed' : 'denied'} by ${describeRule(winner)}`
    };
    return deepFreeze(decision);
}

/**
 * DENY produced when the actor's roles could not be resolved.
 */
export function identityFailureDecision(
    actorId: string,
    action: string,
    resource: string,
    reason: IdentityResolutionReason
): PolicyDecision {
    const decision: PolicyDecision = {
        effect: 'DENY',
        actorId,
        action,
        resource,
        roles: [],
        matchedRule: null,
        reason: `identity resolution failed: ${reason}`,
        failure: { code: 'IDENTITY_RESOLUTION_FAILED', reason }
    };
    return deepFreeze(decision);
}
