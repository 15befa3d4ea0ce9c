import { logger } from '../logging/logger.js';
import { CoreError } from './coreErrors.js';
import crypto from 'crypto';

/**
 * Internal failures (database, handler, transport) are wrapped in a generic
 * error carrying an incident id. Full details go to the log under that id.
 */
export class InternalSystemError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel: string;
    public readonly sqlState?: string;

    constructor(
        public readonly publicMessage: string,
        contextLabel: string,
        internalDetails: unknown,
        options?: { cause?: unknown; sqlState?: string }
    ) {
        super(publicMessage, { cause: options?.cause });
        this.name = 'InternalSystemError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = contextLabel;
        this.sqlState = options?.sqlState;

        logger.error({
            incidentId: this.incidentId,
            contextLabel,
            internalDetails
        }, publicMessage);
    }
}

function stringField(err: object, key: 'message' | 'stack' | 'code'): string | undefined {
    if (!(key in err)) return undefined;
    const value: unknown = Reflect.get(err, key);
    return typeof value === 'string' ? value : undefined;
}

function describe(err: unknown): { message?: string; stack?: string; code?: string } {
    if (typeof err === 'string') {
        return { message: err };
    }
    if (err !== null && typeof err === 'object' && (err instanceof Error || 'message' in err)) {
        return {
            message: stringField(err, 'message'),
            stack: stringField(err, 'stack'),
            code: stringField(err, 'code')
        };
    }
    return { message: String(err) };
}

export const ErrorSanitizer = {
    /**
     * Wraps any non-core error into an InternalSystemError.
     * Core errors pass through so their kind stays distinguishable.
     */
    sanitize: (err: unknown, contextLabel: string): CoreError | InternalSystemError => {
        if (err instanceof CoreError || err instanceof InternalSystemError) return err;

        const original = describe(err);
        return new InternalSystemError(
            `An internal system error occurred (${contextLabel})`,
            contextLabel,
            { originalError: original.message, stack: original.stack },
            { cause: err, sqlState: original.code }
        );
    }
};
