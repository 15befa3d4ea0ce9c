import crypto from "crypto";
import type { AuditConfig } from "../config/coreConfig.js";
import type { AuditEvent, AuditEventFields, UnsealedAuditEvent } from "./schema.js";
import { AuditEventRecordSchema, toRecord } from "./schema.js";
import { isMalformedRecord, type AuditStore, type StoredAuditEntry } from "./store.js";
import { sealEvent } from "./hashing.js";
import { ChainVerifier, type VerificationResult, type VerificationSuccess } from "./integrity.js";
import { validate } from "../validation/zod-middleware.js";
import { ContentionError, IntegrityError } from "../errors/coreErrors.js";
import { logger } from "../logging/logger.js";

const log = logger.child({ component: "AuditChain" });

export type AuditChainOptions =
    Pick<AuditConfig, 'genesisHash' | 'hashAlgorithm' | 'appendRetryLimit' | 'readPageSize'> & {
        readonly clock?: () => Date;
    };

/** Inclusive sequence bounds. `to` defaults to the tip when reading starts. */
export interface SequenceRange {
    readonly from?: number;
    readonly to?: number;
}

/**
 * Hash-chained Audit Log
 *
 * Appends to one stream are serialized in process by a promise queue. Writers
 * in other processes are handled by the store's compare-and-append: a lost
 * race re-reads the tip and recomputes, up to appendRetryLimit attempts.
 * Either way a stream never forks.
 */
export class AuditChain {
    private readonly queues = new Map<string, Promise<void>>();
    private readonly clock: () => Date;

    constructor(
        private readonly store: AuditStore,
        private readonly options: AuditChainOptions
    ) {
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * @throws ContentionError when the tip kept moving for appendRetryLimit attempts
     * @throws SchemaError when the fields do not form a valid event
     */
    append(streamId: string, fields: AuditEventFields): Promise<AuditEvent> {
        const previous = this.queues.get(streamId) ?? Promise.resolve();
        const run = previous.then(() => this.appendWithRetry(streamId, fields));

        // The queue only orders work; each caller observes its own outcome via `run`.
        const tail = run.then(() => undefined, () => undefined);
        this.queues.set(streamId, tail);
        void tail.then(() => {
            if (this.queues.get(streamId) === tail) this.queues.delete(streamId);
        });

        return run;
    }

    /**
     * Lazy, restartable iteration in chain order. Each iteration pages
     * through the store afresh. A record that no longer decodes raises
     * IntegrityError; verify reports it instead.
     */
    read(streamId: string, range: SequenceRange = {}): AsyncIterable<AuditEvent> {
        return {
            [Symbol.asyncIterator]: () => this.iterate(streamId, range)
        };
    }

    /**
     * Pure recompute pass over a range. Never writes.
     */
    async verify(streamId: string, range: SequenceRange = {}): Promise<VerificationResult> {
        const from = range.from ?? 0;
        let expectedPrevHash = this.options.genesisHash;

        if (from > 0) {
            const [anchor] = await this.store.readRange(streamId, from - 1, 1);
            if (anchor === undefined || anchor.sequence !== from - 1) {
                // Nothing precedes the range; only an empty range is consistent.
                const [first] = await this.store.readRange(streamId, from, 1);
                if (first === undefined) return { valid: true, checked: 0, lastHash: expectedPrevHash };
                return {
                    valid: false,
                    position: from,
                    eventId: isMalformedRecord(first) ? null : first.eventId,
                    reason: 'SEQUENCE_GAP',
                    detail: `No event at sequence ${from - 1} to anchor the range`
                };
            }
            if (isMalformedRecord(anchor)) {
                return {
                    valid: false,
                    position: anchor.sequence,
                    eventId: null,
                    reason: 'MALFORMED_RECORD',
                    detail: anchor.detail
                };
            }
            expectedPrevHash = anchor.hash;
        }

        const verifier = new ChainVerifier({
            streamId,
            startSequence: from,
            expectedPrevHash,
            hashAlgorithm: this.options.hashAlgorithm
        });

        for await (const entry of this.entries(streamId, { ...range, from })) {
            const failure = isMalformedRecord(entry)
                ? verifier.malformed(entry.detail, entry.sequence)
                : verifier.check(entry);
            if (failure) break;
        }

        const result = verifier.result();
        if (!result.valid) {
            log.error({ streamId, ...result }, "Audit chain divergence detected");
        }
        return result;
    }

    /**
     * @throws IntegrityError at the first divergence
     */
    async assertIntact(streamId: string, range: SequenceRange = {}): Promise<VerificationSuccess> {
        const result = await this.verify(streamId, range);
        if (!result.valid) {
            throw new IntegrityError(streamId, result);
        }
        return result;
    }

    private async appendWithRetry(streamId: string, fields: AuditEventFields): Promise<AuditEvent> {
        const eventId = crypto.randomUUID();
        const timestamp = this.clock().toISOString();

        for (let attempt = 1; attempt <= this.options.appendRetryLimit; attempt++) {
            const tip = await this.store.getTip(streamId);

            const unsealed: UnsealedAuditEvent = {
                eventId,
                streamId,
                sequence: tip ? tip.sequence + 1 : 0,
                prevHash: tip?.hash ?? this.options.genesisHash,
                timestamp,
                actor: fields.actor,
                action: fields.action,
                resource: fields.resource,
                outcome: fields.outcome,
                eventType: fields.eventType,
                envelopeRef: fields.envelopeRef,
                sourceService: fields.sourceService,
                details: structuredClone(fields.details)
            };
            const event = sealEvent(unsealed, this.options.hashAlgorithm);
            validate(AuditEventRecordSchema, toRecord(event), `AuditEvent:${fields.eventType}`);

            if (await this.store.compareAndAppend(streamId, tip?.hash ?? null, event)) {
                log.debug({
                    streamId,
                    sequence: event.sequence,
                    eventType: event.eventType,
                    outcome: event.outcome,
                    integrityHash: event.hash
                }, "Audit event appended");
                return event;
            }

            log.warn({ streamId, attempt }, "Audit stream tip moved during append; retrying");
        }

        log.error({ streamId, attempts: this.options.appendRetryLimit }, "Audit append contention exhausted");
        throw new ContentionError(streamId, this.options.appendRetryLimit);
    }

    private async *iterate(streamId: string, range: SequenceRange): AsyncGenerator<AuditEvent> {
        for await (const entry of this.entries(streamId, range)) {
            if (isMalformedRecord(entry)) {
                throw new IntegrityError(streamId, {
                    valid: false,
                    position: entry.sequence,
                    eventId: null,
                    reason: 'MALFORMED_RECORD',
                    detail: entry.detail
                });
            }
            yield entry;
        }
    }

    private async *entries(streamId: string, range: SequenceRange): AsyncGenerator<StoredAuditEntry> {
        let next = range.from ?? 0;
        let to = range.to;

        if (to === undefined) {
            const tip = await this.store.getTip(streamId);
            if (!tip) return;
            to = tip.sequence;
        }

        // Bounded by count, not by the sequence numbers the store returns.
        let remaining = to - next + 1;
        while (remaining > 0) {
            const limit = Math.min(this.options.readPageSize, remaining);
            const page = await this.store.readRange(streamId, next, limit);
            if (page.length === 0) return;

            for (const entry of page.slice(0, limit)) {
                yield entry;
                remaining--;
                next = Math.max(next + 1, entry.sequence + 1);
            }

            if (page.length < limit) return;
        }
    }
}
