import type { RequestHandler } from "express";

import { AccessGuard, GuardOutcome, GuardRoute } from "../security/accessGuard.js";
import { AuthError, PublicError, RateLimitedError } from "./publicErrorHandler.js";
import { clientAddress } from "./rateLimitMiddleware.js";

function outcomeToError(outcome: GuardOutcome): PublicError | null {
    switch (outcome.status) {
        case "admitted":
        case "skipped":
            return null;
        case "rate_limited":
            return new RateLimitedError("Too many failed attempts", outcome.reason);
        case "rejected":
            switch (outcome.reason) {
                case "AUTH_REQUIRED":
                    return new AuthError("Authorization required", outcome.reason);
                case "INVALID_API_KEY":
                    return new AuthError("Invalid API key", outcome.reason);
                case "ENDPOINT_DISABLED":
                    return new AuthError("Delete endpoint is disabled", outcome.reason);
            }
    }
}

export function requireApiKey(guard: AccessGuard, route: GuardRoute): RequestHandler {
    return (req, _res, next) => {
        const outcome = guard.check(route, req.header("authorization"), clientAddress(req));
        const err = outcomeToError(outcome);
        if (err) return next(err);
        next();
    };
}
