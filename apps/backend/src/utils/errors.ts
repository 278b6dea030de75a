export class AppError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code: string = 'INTERNAL_ERROR',
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

// Unknown seller, listing or catalog handle
export class NotFoundError extends AppError {
    constructor(
        message: string = "Resource not found",
        details?: Record<string, unknown>
    ) {
        super(message, 404, "NOT_FOUND", details);
    }
}

export class ConflictError extends AppError {
    constructor(
        message: string = "Resource already exists",
        details?: Record<string, unknown>
    ) {
        super(message, 409, "CONFLICT", details);
    }
}

// Undo window expired; never retryable
export class GoneError extends AppError {
    constructor(
        message: string = "Undo window has expired",
        details?: Record<string, unknown>
    ) {
        super(message, 410, "GONE", details);
    }
}

export class InvalidInputError extends AppError {
    constructor(
        message: string = "Invalid input",
        details?: Record<string, unknown>,
        statusCode: number = 400
    ) {
        super(message, statusCode, "INVALID_INPUT", details);
    }
}

export class PayloadTooLargeError extends InvalidInputError {
    constructor(
        message: string = "File too large",
        details?: Record<string, unknown>
    ) {
        super(message, details, 413);
    }
}

// Media download or message delivery failed
export class UpstreamFailureError extends AppError {
    constructor(
        message: string = "Upstream service failed",
        details?: Record<string, unknown>
    ) {
        super(message, 502, "UPSTREAM_FAILURE", details);
    }
}

export class UnauthorizedError extends AppError {
    constructor(
        message: string = "Authentication required",
        details?: Record<string, unknown>
    ) {
        super(message, 401, "UNAUTHORIZED", details);
    }
}

export class ForbiddenError extends AppError {
    constructor(
        message: string = "Forbidden",
        details?: Record<string, unknown>
    ) {
        super(message, 403, "FORBIDDEN", details);
    }
}

export class SlugAllocationError extends AppError {
    constructor(
        message: string = "Could not allocate a unique catalog slug",
        details?: Record<string, unknown>
    ) {
        super(message, 500, "SLUG_ALLOCATION_FAILED", details);
    }
}

/**
 * Returned, never thrown, by the audit trail when a record could not be
 * persisted.
 */
export class AuditWriteFailed extends Error {
    constructor(
        public readonly action: string,
        public readonly reason: unknown
    ) {
        super(`Failed to write ${action} audit record: ${errorMessage(reason)}`);
        this.name = 'AuditWriteFailed';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
