import crypto from "crypto";

import { RateLimiter, Clock } from "../rateLimiter/rateLimiter.js";
import { AuthConfig } from "../../config/snapstashConfig.js";
import { SnapstashLogger, emit } from "../logging/createLogger.js";

const BEARER_PREFIX = "Bearer ";
const FAILED_ATTEMPT_WINDOW_MS = 60_000;

export type GuardRoute = "upload" | "delete";

export type GuardOutcome =
    | { status: "admitted" }
    | { status: "skipped" }
    | { status: "rejected"; reason: "AUTH_REQUIRED" | "INVALID_API_KEY" | "ENDPOINT_DISABLED" }
    | { status: "rate_limited"; reason: "TOO_MANY_FAILED_ATTEMPTS" };

// hashing first gives timingSafeEqual equal-length inputs whatever the token length
function constantTimeEquals(supplied: string, secret: string): boolean {
    const a = crypto.createHash("sha256").update(supplied).digest();
    const b = crypto.createHash("sha256").update(secret).digest();
    return crypto.timingSafeEqual(a, b);
}

export class AccessGuard {
    private failedAttempts: RateLimiter;

    constructor(
        private config: AuthConfig,
        private logger?: SnapstashLogger,
        now: Clock = Date.now
    ) {
        this.failedAttempts = new RateLimiter(
            FAILED_ATTEMPT_WINDOW_MS,
            config.maxFailedAttemptsPerMinute,
            now
        );
    }

    /**
     * Decides a mutating request. Deletes are refused outright unless a
     * secret is configured and the delete flag is on; uploads are only
     * checked when both a secret and the upload flag are set.
     */
    check(route: GuardRoute, authorization: string | undefined, clientKey: string): GuardOutcome {
        const { apiKey } = this.config;

        if (route === "delete" && (!apiKey || !this.config.requireForDelete)) {
            return { status: "rejected", reason: "ENDPOINT_DISABLED" };
        }

        if (route === "upload" && (!apiKey || !this.config.requireForUpload)) {
            return { status: "skipped" };
        }

        return this.authenticate(authorization, clientKey);
    }

    authenticate(authorization: string | undefined, clientKey: string): GuardOutcome {
        if (!authorization || !authorization.startsWith(BEARER_PREFIX)) {
            return { status: "rejected", reason: "AUTH_REQUIRED" };
        }

        const token = authorization.slice(BEARER_PREFIX.length);
        const { apiKey } = this.config;

        if (apiKey && constantTimeEquals(token, apiKey)) {
            return { status: "admitted" };
        }

        if (!this.failedAttempts.check(clientKey)) {
            emit(this.logger, "warn", "Failed attempt limit reached", {
                event: "AUTH_RATE_LIMITED",
                client: clientKey
            });
            return { status: "rate_limited", reason: "TOO_MANY_FAILED_ATTEMPTS" };
        }

        emit(this.logger, "info", "Invalid API key", {
            event: "AUTH_FAILED",
            client: clientKey
        });
        return { status: "rejected", reason: "INVALID_API_KEY" };
    }
}
