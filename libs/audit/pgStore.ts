/**
 * PostgreSQL audit store.
 *
 * The tip of every stream lives in audit_chain_state. An append moves the
 * tip with a conditional UPDATE (or creates it with INSERT ... ON CONFLICT
 * DO NOTHING) and inserts the event in the same transaction; zero affected
 * rows means another writer won. audit_events is append-only at the database
 * layer (see sql/001_audit_chain.sql).
 */

import { z } from 'zod';
import type { RowStore } from '../db/index.js';
import type { AuditStore, ChainTip, StoredAuditEntry } from './store.js';
import { AuditEventRecordSchema, fromRecord, toRecord, type AuditEvent } from './schema.js';
import { validate } from '../validation/zod-middleware.js';
import { deepFreeze } from '../canonical/json.js';

// bigint columns are selected as text
const BigintTextSchema = z.string().regex(/^\d+$/).transform(Number);

const TipRowSchema = z.object({
    tip_hash: z.string(),
    tip_sequence: BigintTextSchema
});

const EventRowSchema = z.object({
    sequence: BigintTextSchema,
    record: z.unknown()
});

type EventRow = z.infer<typeof EventRowSchema>;

function quoteIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
}

export class PgAuditStore implements AuditStore {
    private readonly stateTable: string;
    private readonly eventsTable: string;

    constructor(private readonly db: RowStore, schema = 'audit') {
        this.stateTable = `${quoteIdentifier(schema)}.audit_chain_state`;
        this.eventsTable = `${quoteIdentifier(schema)}.audit_events`;
    }

    async getTip(streamId: string): Promise<ChainTip | null> {
        const result = await this.db.query(
            `SELECT tip_hash, tip_sequence::text AS tip_sequence
             FROM ${this.stateTable}
             WHERE stream_id = $1`,
            [streamId]
        );

        const [row] = validate(z.array(TipRowSchema), result.rows, 'AuditStore:tip');
        return row ? { hash: row.tip_hash, sequence: row.tip_sequence } : null;
    }

    async compareAndAppend(streamId: string, expectedTipHash: string | null, event: AuditEvent): Promise<boolean> {
        return this.db.transaction(async tx => {
            const moved = expectedTipHash === null
                ? await tx.query(
                    `INSERT INTO ${this.stateTable} (stream_id, tip_hash, tip_sequence)
                     VALUES ($1, $2, $3)
                     ON CONFLICT (stream_id) DO NOTHING`,
                    [streamId, event.hash, event.sequence]
                )
                : await tx.query(
                    `UPDATE ${this.stateTable}
                     SET tip_hash = $2, tip_sequence = $3, updated_at = NOW()
                     WHERE stream_id = $1 AND tip_hash = $4`,
                    [streamId, event.hash, event.sequence, expectedTipHash]
                );

            if ((moved.rowCount ?? 0) === 0) return false;

            await tx.query(
                `INSERT INTO ${this.eventsTable}
                    (stream_id, sequence, event_id, prev_hash, hash, occurred_at, record)
                 VALUES ($1, $2, $3, $4, $5, $6, $7)`,
                [
                    streamId,
                    event.sequence,
                    event.eventId,
                    event.prevHash,
                    event.hash,
                    event.timestamp,
                    JSON.stringify(toRecord(event))
                ]
            );

            return true;
        });
    }

    async readRange(streamId: string, fromSequence: number, limit: number): Promise<readonly StoredAuditEntry[]> {
        const result = await this.db.query(
            `SELECT sequence::text AS sequence, record
             FROM ${this.eventsTable}
             WHERE stream_id = $1 AND sequence >= $2
             ORDER BY sequence ASC
             LIMIT $3`,
            [streamId, fromSequence, limit]
        );

        return validate(z.array(EventRowSchema), result.rows, 'AuditStore:events')
            .map(row => this.mapRow(row));
    }

    private mapRow(row: EventRow): StoredAuditEntry {
        const parsed = AuditEventRecordSchema.safeParse(row.record);
        if (!parsed.success) {
            return {
                kind: 'malformed',
                sequence: row.sequence,
                detail: parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')
            };
        }
        return deepFreeze(fromRecord(parsed.data));
    }
}
