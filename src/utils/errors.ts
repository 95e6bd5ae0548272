/**
 * Error types surfaced to the HTTP layer. Each carries the status code the
 * error middleware answers with.
 */

export class AppError extends Error {
    readonly statusCode: number;

    constructor(message: string, statusCode: number) {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404);
    }
}

export type SchedulingErrorCode =
    | 'unit_not_found'
    | 'unit_unavailable'
    | 'unit_double_booked'
    | 'not_active'
    | 'calendar_timeout'
    | 'calendar_failed'
    | 'followups_failed';

export class SchedulingError extends AppError {
    readonly code: SchedulingErrorCode;

    constructor(code: SchedulingErrorCode, message: string) {
        super(message, 409);
        this.code = code;
    }
}

export class LockBusyError extends AppError {
    constructor(key: string) {
        super(`"${key}" is currently being processed. Please retry shortly.`, 429);
    }
}

/** A write that would break a data invariant. Aborts the whole operation. */
export class InvariantViolationError extends AppError {
    constructor(message: string) {
        super(message, 500);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
