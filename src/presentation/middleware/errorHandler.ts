import { Request, Response, NextFunction } from 'express';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    status: 'error';
    message: string;
    code: string;
}

/**
 * 4xx status set on errors raised by express middleware such as the JSON body parser.
 */
function clientErrorStatus(err: Error): number | undefined {
    const status: unknown = 'status' in err ? err.status : undefined;
    if (typeof status === 'number' && status >= 400 && status < 500) {
        return status;
    }
    return undefined;
}

/**
 * Global error handler middleware.
 * Unexpected errors become 500 with their message passed through to the caller.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    // Express recognises error middleware by its four parameters
    _next: NextFunction
): void {
    const clientStatus = clientErrorStatus(err);

    if (err instanceof NotFoundError || err instanceof BadRequestError || clientStatus !== undefined) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    let statusCode = 500;
    let code = 'INTERNAL_ERROR';
    if (err instanceof AppError) {
        statusCode = err.statusCode;
        code = err.name;
    } else if (clientStatus !== undefined) {
        statusCode = clientStatus;
        code = 'BAD_REQUEST';
    }

    const response: ErrorResponse = { status: 'error', message: err.message, code };
    res.status(statusCode).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
