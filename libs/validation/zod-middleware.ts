import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { SchemaError, type SchemaIssue } from '../errors/coreErrors.js';

/**
 * Fail-closed boundary validation.
 * Returns the parsed value or throws SchemaError; never coerces silently.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues: SchemaIssue[] = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Payloads may carry PII; only the issue list is logged.
        logger.warn({ context, errors: issues }, "Input validation failure");

        throw new SchemaError(context, issues);
    }

    return result.data;
}

/**
 * Factory for creating bound validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
