import { createEnvelope } from '../../libs/envelope/envelope.js';
import type { EnvelopeOf } from '../../libs/envelope/types.js';
import type { AuditChainOptions } from '../../libs/audit/chain.js';
import type { Permission } from '../../libs/rbac/decision.js';
import type { RbacConfig } from '../../libs/config/coreConfig.js';
import type { RowQuery, RowStore } from '../../libs/db/index.js';

export const GENESIS = '0'.repeat(64);

export const CHAIN_OPTIONS: AuditChainOptions = {
    genesisHash: GENESIS,
    hashAlgorithm: 'sha256',
    appendRetryLimit: 5,
    readPageSize: 100
};

export const RBAC_CONFIG: RbacConfig = {
    stalenessWindowMs: 60_000,
    resolutionTimeoutMs: 500,
    maxCachedActors: 100,
    maxCachedRoles: 100
};

export function allow(action: string, resourcePattern: string): Permission {
    return { action, resourcePattern, effect: 'ALLOW' };
}

export function deny(action: string, resourcePattern: string): Permission {
    return { action, resourcePattern, effect: 'DENY' };
}

export function userRequest(actorId: string, action: string, resource: string, tenantId?: string): EnvelopeOf<'resource.request'> {
    return createEnvelope({
        sourceService: 'gateway',
        actor: { id: actorId, kind: 'user' },
        authContext: {
            subject: actorId,
            mechanism: 'oidc',
            ...(tenantId !== undefined ? { tenantId } : {})
        },
        messageType: 'resource.request',
        payload: { action, resource }
    });
}

export function userQuery(actorId: string, text: string, channel?: string): EnvelopeOf<'user.query'> {
    return createEnvelope({
        sourceService: 'gateway',
        actor: { id: actorId, kind: 'user' },
        authContext: { subject: actorId, mechanism: 'oidc' },
        messageType: 'user.query',
        payload: { text, ...(channel !== undefined ? { channel } : {}) }
    });
}

export interface RecordedQuery {
    readonly text: string;
    readonly params: readonly unknown[];
}

export interface CannedResult {
    readonly rows: unknown[];
    readonly rowCount?: number | null;
}

/**
 * In-process stand-in for the pooled database. Answers queries from a
 * queue of canned results (an empty result once the queue runs dry) and
 * records every statement, including those run inside transactions.
 */
export class FakeDatabase implements RowStore {
    readonly queries: RecordedQuery[] = [];
    private readonly results: CannedResult[] = [];
    transactions = 0;

    respond(...results: CannedResult[]): this {
        this.results.push(...results);
        return this;
    }

    async query(text: string, params: unknown[] = []): Promise<{ rows: unknown[]; rowCount: number | null }> {
        this.queries.push({ text: text.replace(/\s+/g, ' ').trim(), params });
        const next = this.results.shift();
        if (!next) return { rows: [], rowCount: 0 };
        return { rows: next.rows, rowCount: next.rowCount === undefined ? next.rows.length : next.rowCount };
    }

    async transaction<T>(callback: (tx: RowQuery) => Promise<T>): Promise<T> {
        this.transactions++;
        return callback(this);
    }
}

/**
 * Resolves after `ms`; for tests that need a source slower than a deadline.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
