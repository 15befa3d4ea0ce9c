/**
 * JSONL export of audit streams.
 * One persisted (snake_case) record per line, in chain order, so an auditor
 * can verify an export offline with verifyAuditFile.
 */

import { AuditEventRecordSchema, fromRecord, toRecord, type AuditEvent } from './schema.js';
import { SchemaError } from '../errors/coreErrors.js';

export type AuditJsonlLine =
    | { ok: true; event: AuditEvent; lineNumber: number }
    | { ok: false; error: string; lineNumber: number };

export function formatAuditJsonl(events: readonly AuditEvent[]): string {
    if (events.length === 0) return '';
    return events.map(event => JSON.stringify(toRecord(event))).join('\n') + '\n';
}

export function parseAuditJsonlLine(line: string, lineNumber: number): AuditJsonlLine {
    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch (e) {
        return { ok: false, error: e instanceof Error ? e.message : 'JSON parse error', lineNumber };
    }

    const result = AuditEventRecordSchema.safeParse(raw);
    if (!result.success) {
        const first = result.error.issues[0];
        return {
            ok: false,
            error: first ? `${first.path.join('.') || '<root>'}: ${first.message}` : 'Invalid audit record',
            lineNumber
        };
    }

    return { ok: true, event: fromRecord(result.data), lineNumber };
}

/**
 * Parses a JSONL export. Blank lines are skipped.
 * @throws SchemaError on the first line that is not a valid audit record
 */
export function parseAuditJsonl(content: string): AuditEvent[] {
    const events: AuditEvent[] = [];
    const lines = content.split('\n');

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (line === undefined || line.trim() === '') continue;

        const parsed = parseAuditJsonlLine(line, i + 1);
        if (!parsed.ok) {
            throw new SchemaError('AuditJsonl', [{ path: `line ${parsed.lineNumber}`, message: parsed.error }]);
        }
        events.push(parsed.event);
    }

    return events;
}
