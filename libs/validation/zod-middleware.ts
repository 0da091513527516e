import type { ZodSchema, ZodTypeDef } from 'zod';
import { ValidationError } from '../errors/taxonomy.js';
import { logger } from '../logging/logger.js';

/**
 * Ingress validation.
 * Returns the parsed value or throws a ValidationError listing every failing path.
 * Only paths and messages are logged, never the submitted values.
 */
export function validate<T>(schema: ZodSchema<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: errorDetails }, 'Input validation failure');

        const summary = errorDetails.map(detail => detail.path ? `${detail.path}: ${detail.message}` : detail.message);
        throw new ValidationError(`Invalid ${context}: ${summary.join('; ')}`, errorDetails);
    }

    return result.data;
}

/**
 * Factory for a validator bound to one schema.
 */
export const createValidator = <T>(schema: ZodSchema<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
