import fs from "fs";
import type { HashAlgorithm } from "../canonical/json.js";
import type { AuditEvent } from "./schema.js";
import { computeEventHash } from "./hashing.js";
import { parseAuditJsonlLine } from "./jsonl.js";

/**
 * Audit Integrity Verifier
 * Recomputes every hash and checks linkage, position and stream membership.
 * Read-only: a divergence is reported, never repaired.
 */

export type VerificationReason =
    | 'HASH_MISMATCH'
    | 'LINKAGE_MISMATCH'
    | 'SEQUENCE_GAP'
    | 'STREAM_MISMATCH'
    | 'MALFORMED_RECORD';

export interface VerificationSuccess {
    readonly valid: true;
    readonly checked: number;
    readonly lastHash: string;
}

export interface VerificationFailure {
    readonly valid: false;
    readonly position: number;
    readonly eventId: string | null;
    readonly reason: VerificationReason;
    readonly detail: string;
}

export type VerificationResult = VerificationSuccess | VerificationFailure;

export interface ChainVerifierOptions {
    readonly streamId: string;
    readonly startSequence: number;
    readonly expectedPrevHash: string;
    readonly hashAlgorithm: HashAlgorithm;
}

/**
 * Incremental verifier. Feed events in chain order; the first failure is
 * sticky.
 */
export class ChainVerifier {
    private expectedSequence: number;
    private expectedPrevHash: string;
    private checked = 0;
    private failure: VerificationFailure | null = null;

    constructor(private readonly options: ChainVerifierOptions) {
        this.expectedSequence = options.startSequence;
        this.expectedPrevHash = options.expectedPrevHash;
    }

    /** Returns the failure once one has been found. */
    check(event: AuditEvent): VerificationFailure | null {
        if (this.failure) return this.failure;

        if (event.streamId !== this.options.streamId) {
            return this.fail(event, 'STREAM_MISMATCH',
                `Event belongs to stream ${event.streamId}, expected ${this.options.streamId}`);
        }

        if (event.sequence !== this.expectedSequence) {
            return this.fail(event, 'SEQUENCE_GAP',
                `Expected sequence ${this.expectedSequence}, found ${event.sequence}`);
        }

        if (event.prevHash !== this.expectedPrevHash) {
            return this.fail(event, 'LINKAGE_MISMATCH',
                `prevHash mismatch. Expected ${this.expectedPrevHash}, found ${event.prevHash}`);
        }

        const computed = computeEventHash(event, this.options.hashAlgorithm);
        if (computed !== event.hash) {
            return this.fail(event, 'HASH_MISMATCH',
                `Hash mismatch. Computed ${computed}, found ${event.hash}`);
        }

        this.expectedSequence = event.sequence + 1;
        this.expectedPrevHash = event.hash;
        this.checked++;
        return null;
    }

    /**
     * Records an undecodable record. A record stored at some other sequence
     * is a gap before it is a malformed record.
     */
    malformed(detail: string, sequence: number = this.expectedSequence): VerificationFailure {
        if (this.failure) return this.failure;
        const gap = sequence !== this.expectedSequence;
        this.failure = {
            valid: false,
            position: this.expectedSequence,
            eventId: null,
            reason: gap ? 'SEQUENCE_GAP' : 'MALFORMED_RECORD',
            detail: gap ? `Expected sequence ${this.expectedSequence}, found ${sequence}` : detail
        };
        return this.failure;
    }

    result(): VerificationResult {
        return this.failure ?? { valid: true, checked: this.checked, lastHash: this.expectedPrevHash };
    }

    private fail(event: AuditEvent, reason: VerificationReason, detail: string): VerificationFailure {
        this.failure = {
            valid: false,
            position: this.expectedSequence,
            eventId: event.eventId,
            reason,
            detail
        };
        return this.failure;
    }
}

export interface VerifyFileOptions {
    readonly genesisHash?: string;
    readonly hashAlgorithm?: HashAlgorithm;
}

/**
 * Verifies a single-stream JSONL export from genesis.
 * A missing or empty file has nothing to verify.
 */
export function verifyAuditFile(auditFilePath: string, options: VerifyFileOptions = {}): VerificationResult {
    const genesisHash = options.genesisHash ?? "0".repeat(64);

    if (!fs.existsSync(auditFilePath)) {
        return { valid: true, checked: 0, lastHash: genesisHash };
    }

    const lines = fs.readFileSync(auditFilePath, "utf8").split("\n");
    let verifier: ChainVerifier | null = null;

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (line === undefined || line.trim() === "") continue;

        const parsed = parseAuditJsonlLine(line, i + 1);

        // The first record names the stream under verification.
        if (verifier === null) {
            verifier = new ChainVerifier({
                streamId: parsed.ok ? parsed.event.streamId : "",
                startSequence: 0,
                expectedPrevHash: genesisHash,
                hashAlgorithm: options.hashAlgorithm ?? "sha256"
            });
        }

        if (!parsed.ok) {
            return verifier.malformed(`Line ${parsed.lineNumber}: ${parsed.error}`);
        }

        const failure = verifier.check(parsed.event);
        if (failure) return failure;
    }

    return verifier?.result() ?? { valid: true, checked: 0, lastHash: genesisHash };
}
