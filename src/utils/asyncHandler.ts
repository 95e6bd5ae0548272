/**
 * src/utils/asyncHandler.ts
 *
 * Wraps async route handlers so a rejected promise reaches the error
 * middleware instead of hanging the request (Express 4 does not await).
 * The params type flows through, so `req.params.id` stays typed.
 *
 * USAGE:
 *   router.post('/:id/cancel', asyncHandler(async (req, res) => { ... }))
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';

type DefaultParams = Request['params'];

type AsyncRouteHandler<P> = (req: Request<P>, res: Response, next: NextFunction) => Promise<void>;

export function asyncHandler<P = DefaultParams>(fn: AsyncRouteHandler<P>): RequestHandler<P> {
    return (req, res, next) => {
        fn(req, res, next).catch(next);
    };
}
