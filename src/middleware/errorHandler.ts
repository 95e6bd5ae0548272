import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError, SchedulingError } from '../utils/errors';
import { logger } from '../utils/logger';

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof ZodError) {
        logger.warn('ErrorHandler', `400 — ${req.method} ${req.originalUrl} — invalid input`);
        res.status(400).json({
            error: 'Validation failed',
            details: err.errors.map((e) => ({ field: e.path.join('.'), message: e.message })),
        });
        return;
    }

    if (err instanceof AppError) {
        const log = err.statusCode >= 500 ? logger.error : logger.warn;
        log('ErrorHandler', `${err.statusCode} — ${req.method} ${req.originalUrl} — ${err.message}`);
        res.status(err.statusCode).json({
            error: err.message,
            ...(err instanceof SchedulingError && { code: err.code }),
        });
        return;
    }

    const message = err instanceof Error ? err.message : String(err);
    logger.error('ErrorHandler', `500 — ${req.method} ${req.originalUrl} — ${message}`);
    if (err instanceof Error) logger.debug('ErrorHandler', 'Stack trace:', err.stack);

    res.status(500).json({
        error: 'Internal server error',
        ...(process.env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack }),
    });
}
