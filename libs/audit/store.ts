import type { AuditEvent } from './schema.js';
import { deepFreeze } from '../canonical/json.js';

export interface ChainTip {
    readonly hash: string;
    readonly sequence: number;
}

/** A stored row that no longer decodes as an audit event. */
export interface MalformedAuditRecord {
    readonly kind: 'malformed';
    readonly sequence: number;
    readonly detail: string;
}

export type StoredAuditEntry = AuditEvent | MalformedAuditRecord;

export function isMalformedRecord(entry: StoredAuditEntry): entry is MalformedAuditRecord {
    return 'kind' in entry && entry.kind === 'malformed';
}

/**
 * Durable storage for audit streams.
 *
 * compareAndAppend is the only write. It must be atomic: the event is stored
 * only if the stream's current tip hash still equals expectedTipHash (null
 * meaning the stream does not exist yet). It returns false when the tip has
 * moved; the caller re-reads the tip and recomputes.
 */
export interface AuditStore {
    getTip(streamId: string): Promise<ChainTip | null>;
    compareAndAppend(streamId: string, expectedTipHash: string | null, event: AuditEvent): Promise<boolean>;
    /**
     * Entries with sequence >= fromSequence, in chain order, at most `limit`.
     * A row that fails to decode is returned in place as a MalformedAuditRecord.
     */
    readRange(streamId: string, fromSequence: number, limit: number): Promise<readonly StoredAuditEntry[]>;
}

/**
 * Single-process store. Events live in one arena; each stream keeps an
 * index of arena positions ordered by sequence.
 */
export class InMemoryAuditStore implements AuditStore {
    private readonly arena: AuditEvent[] = [];
    private readonly streams = new Map<string, number[]>();

    async getTip(streamId: string): Promise<ChainTip | null> {
        const last = this.lastOf(streamId);
        return last ? { hash: last.hash, sequence: last.sequence } : null;
    }

    async compareAndAppend(streamId: string, expectedTipHash: string | null, event: AuditEvent): Promise<boolean> {
        // No await between the check and the write.
        const last = this.lastOf(streamId);
        const currentTip = last?.hash ?? null;
        if (currentTip !== expectedTipHash) return false;

        const nextSequence = last ? last.sequence + 1 : 0;
        if (event.sequence !== nextSequence) {
            throw new Error(`Audit event for ${streamId} has sequence ${event.sequence}, expected ${nextSequence}`);
        }

        const index = this.streams.get(streamId) ?? [];
        index.push(this.arena.length);
        this.arena.push(deepFreeze(structuredClone(event)));
        this.streams.set(streamId, index);
        return true;
    }

    async readRange(streamId: string, fromSequence: number, limit: number): Promise<readonly AuditEvent[]> {
        const index = this.streams.get(streamId) ?? [];
        const out: AuditEvent[] = [];

        // Sequence n sits at index position n.
        for (let i = Math.max(0, fromSequence); i < index.length && out.length < limit; i++) {
            const position = index[i];
            const event = position === undefined ? undefined : this.arena[position];
            if (event) out.push(event);
        }

        return out;
    }

    streamIds(): string[] {
        return [...this.streams.keys()];
    }

    size(): number {
        return this.arena.length;
    }

    private lastOf(streamId: string): AuditEvent | undefined {
        const index = this.streams.get(streamId);
        const position = index?.[index.length - 1];
        return position === undefined ? undefined : this.arena[position];
    }
}
