/**
 * Core error taxonomy.
 * Each failure kind carries a machine-readable code so callers can choose
 * fail-closed behavior without parsing messages.
 */

import type { PolicyDecision } from '../rbac/decision.js';
import type { VerificationFailure } from '../audit/integrity.js';

export type CoreErrorCode =
    | 'SCHEMA_INVALID'
    | 'IDENTITY_RESOLUTION_FAILED'
    | 'AUTHORIZATION_DENIED'
    | 'INTEGRITY_VIOLATION'
    | 'APPEND_CONTENTION'
    | 'REGISTRY_UNREACHABLE'
    | 'CONFIGURATION_INVALID';

export abstract class CoreError extends Error {
    abstract readonly code: CoreErrorCode;
    abstract readonly statusCode: number;

    protected constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export interface SchemaIssue {
    readonly path: string;
    readonly message: string;
}

/**
 * Malformed envelope or payload. Rejected at ingress, never processed.
 */
export class SchemaError extends CoreError {
    readonly code = 'SCHEMA_INVALID';
    readonly statusCode = 400;

    constructor(readonly context: string, readonly issues: readonly SchemaIssue[]) {
        super(`Schema violation in ${context}: ${issues.map(i => `${i.path || '<root>'}: ${i.message}`).join('; ')}`);
    }
}

export type IdentityResolutionReason = 'UNKNOWN_ACTOR' | 'TIMEOUT' | 'SOURCE_FAILURE';

/**
 * The actor could not be resolved to a role set. Always treated as DENY.
 */
export class IdentityResolutionError extends CoreError {
    readonly code = 'IDENTITY_RESOLUTION_FAILED';
    readonly statusCode = 403;

    constructor(readonly actorId: string, readonly reason: IdentityResolutionReason, options?: { cause?: unknown }) {
        super(`Identity resolution failed for actor ${actorId}: ${reason}`, options);
    }
}

/**
 * Explicit or default deny. Always audited as a DENY outcome.
 */
export class AuthorizationDenied extends CoreError {
    readonly code = 'AUTHORIZATION_DENIED';
    readonly statusCode = 403;

    constructor(readonly decision: PolicyDecision, options?: { cause?: unknown }) {
        super(`Access denied: ${decision.action} on ${decision.resource} for ${decision.actorId} (${decision.reason})`, options);
    }
}

/**
 * Hash or linkage mismatch in an audit stream. Fatal for that stream and
 * never corrected automatically.
 */
export class IntegrityError extends CoreError {
    readonly code = 'INTEGRITY_VIOLATION';
    readonly statusCode = 500;

    constructor(readonly streamId: string, readonly failure: VerificationFailure) {
        super(`Audit stream ${streamId} diverges at position ${failure.position}: ${failure.reason} (${failure.detail})`);
    }
}

/**
 * Append retries exhausted. Callers back off and retry as a new operation.
 */
export class ContentionError extends CoreError {
    readonly code = 'APPEND_CONTENTION';
    readonly statusCode = 409;

    constructor(readonly streamId: string, readonly attempts: number) {
        super(`Append to audit stream ${streamId} lost the tip race ${attempts} times`);
    }
}

export type RegistryOperation = 'register' | 'heartbeat' | 'deregister' | 'discover';

/**
 * Registry could not be reached. Degrades discoverability only.
 */
export class RegistryUnreachable extends CoreError {
    readonly code = 'REGISTRY_UNREACHABLE';
    readonly statusCode = 503;

    constructor(readonly operation: RegistryOperation, message: string, options?: { cause?: unknown }) {
        super(`Registry ${operation} failed: ${message}`, options);
    }
}

export class ConfigurationError extends CoreError {
    readonly code = 'CONFIGURATION_INVALID';
    readonly statusCode = 500;

    constructor(readonly errors: readonly string[]) {
        super(`Configuration invalid: ${errors.join('; ')}`);
    }
}

export function isCoreError(err: unknown): err is CoreError {
    return err instanceof CoreError;
}
