import type { Request, RequestHandler } from "express";

import { MultiWindowRateLimiter, Clock } from "../rateLimiter/rateLimiter.js";
import { UploadQuotaConfig } from "../../config/snapstashConfig.js";
import { RateLimitedError } from "./publicErrorHandler.js";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export function clientAddress(req: Request): string {
    return req.ip ?? req.socket.remoteAddress ?? "unknown";
}

/**
 * Per-client upload quota over three fixed windows. Runs before any
 * authentication so it applies whether or not uploads need a token.
 */
export function createUploadQuota({
    quota,
    keyFn = clientAddress,
    now
}: {
    quota: UploadQuotaConfig;
    keyFn?: (req: Request) => string;
    now?: Clock;
}): RequestHandler {
    const limiter = new MultiWindowRateLimiter([
        { windowMs: MINUTE_MS, max: quota.perMinute },
        { windowMs: HOUR_MS, max: quota.perHour },
        { windowMs: DAY_MS, max: quota.perDay }
    ], now);

    return (req, _res, next) => {
        if (!quota.enabled) return next();

        if (!limiter.check(keyFn(req))) {
            return next(new RateLimitedError("Rate limit exceeded", "RATE_LIMIT_EXCEEDED"));
        }

        next();
    };
}
