import type { ErrorRequestHandler } from "express";
import multer from "multer";

import { SnapstashLogger, emit } from "../logging/createLogger.js";

export class PublicError extends Error {
    statusCode: number;
    code: string;

    constructor(
        message: string,
        statusCode: number = 400,
        code: string = "BAD_REQUEST"
    ) {
        super(message);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.code = code;
    }
}

/** Missing or malformed input the caller can correct. */
export class ValidationError extends PublicError {
    constructor(message: string, code: string = "VALIDATION_ERROR", statusCode: number = 400) {
        super(message, statusCode, code);
    }
}

export class InvalidSizeError extends ValidationError {
    constructor(validSizes: readonly number[]) {
        super(
            validSizes.length > 0
                ? `size value must be one of ${validSizes.join(", ")}`
                : "size value must be a positive integer",
            "INVALID_SIZE"
        );
    }
}

/** Content or policy violation: video too long, nudity detected, video disabled. */
export class PolicyRejection extends PublicError {
    constructor(message: string, code: string) {
        super(message, 400, code);
    }
}

export class AuthError extends PublicError {
    constructor(message: string, code: string) {
        super(message, 403, code);
    }
}

export class RateLimitedError extends PublicError {
    constructor(message: string = "Rate limit exceeded", code: string = "RATE_LIMIT_EXCEEDED") {
        super(message, 429, code);
    }
}

export class NotFoundError extends PublicError {
    constructor(message: string = "File not found") {
        super(message, 404, "NOT_FOUND");
    }
}

// never carries the offending path: the message is fixed
export class PathTraversalError extends PublicError {
    constructor() {
        super("Invalid filename", 400, "INVALID_FILENAME");
    }
}

interface HttpLikeError {
    status: number;
    expose?: boolean;
    message: string;
}

// body-parser attaches status/expose to the errors it raises
function isHttpLikeError(err: unknown): err is HttpLikeError {
    return (
        err instanceof Error &&
        "status" in err &&
        typeof err.status === "number"
    );
}

function toPublicError(err: unknown): PublicError | null {
    if (err instanceof PublicError) return err;

    if (err instanceof multer.MulterError) {
        return err.code === "LIMIT_FILE_SIZE"
            ? new ValidationError("File too large", "FILE_TOO_LARGE", 413)
            : new ValidationError("Invalid multipart request", "INVALID_MULTIPART");
    }

    if (isHttpLikeError(err) && err.status < 500 && err.expose !== false) {
        return err.status === 413
            ? new ValidationError("Request body too large", "BODY_TOO_LARGE", 413)
            : new ValidationError("Malformed request body", "INVALID_BODY");
    }

    return null;
}

export function createErrorHandler(logger?: SnapstashLogger): ErrorRequestHandler {
    return (err: unknown, req, res, next) => {
        const publicError = toPublicError(err);
        const status = publicError?.statusCode ?? 500;

        emit(logger, status >= 500 ? "error" : "warn", "HTTP handler error", {
            method: req.method,
            path: req.originalUrl,
            status,
            code: publicError?.code ?? "INTERNAL_ERROR",
            error: err instanceof Error ? err.message : String(err)
        });

        // a stream that failed mid-response can only be cut off
        if (res.headersSent) {
            next(err);
            return;
        }

        if (!publicError) {
            res.status(500).json({ error: "internal server error", code: "INTERNAL_ERROR" });
            return;
        }

        res.status(status).json({ error: publicError.message, code: publicError.code });
    };
}
