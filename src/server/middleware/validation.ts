import type { Request } from 'express';
import { z } from 'zod';
import type { ZodTypeAny } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Validate the request query against a Zod schema and return the parsed value.
 * Throws BadRequestError if validation fails, ensuring errors go through
 * centralized error handling.
 */
export function parseQuery<T extends ZodTypeAny>(schema: T, req: Request): z.output<T> {
    const result = schema.safeParse(req.query);
    if (result.success) {
        return result.data;
    }

    const details = result.error.issues.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
    }));
    logger.warn(
        {
            path: req.path,
            method: req.method,
            issues: details,
        },
        'Request validation failed'
    );

    const first = details[0];
    throw new BadRequestError(first ? `${first.path}: ${first.message}` : 'Validation failed', {
        details,
    });
}

/**
 * Common validation schemas
 */
export const commonSchemas = {
    /** Query-string boolean: "true"/"false" (also 1/0), case-insensitive */
    queryBoolean: z
        .string()
        .trim()
        .toLowerCase()
        .refine((value) => ['true', 'false', '1', '0'].includes(value), {
            message: 'Expected true or false',
        })
        .transform((value) => value === 'true' || value === '1'),
};
