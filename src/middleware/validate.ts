/**
 * src/middleware/validate.ts
 *
 * Zod validation for request input.
 *
 * The handler receives the parsed (and transformed) value as its first
 * argument, so it never reads `req.body` / `req.query` untyped.
 *
 * USAGE:
 *   router.post('/', validate(EventBodySchema, async (body, req, res) => { ... }))
 */

import type { Request, RequestHandler, Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { asyncHandler } from '../utils/asyncHandler';

type InputSource = 'body' | 'query';

export function validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    handler: (input: T, req: Request, res: Response) => Promise<void>,
    source: InputSource = 'body'
): RequestHandler {
    return asyncHandler(async (req, res) => {
        const result = schema.safeParse(source === 'body' ? req.body : req.query);

        if (!result.success) {
            res.status(400).json({
                error: 'Validation failed',
                details: result.error.errors.map((e) => ({
                    field: e.path.join('.'),
                    message: e.message,
                })),
            });
            return;
        }

        await handler(result.data, req, res);
    });
}
