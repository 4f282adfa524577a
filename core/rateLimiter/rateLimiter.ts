type Bucket = {
    count: number;
    resetAt: number;
};

export type Clock = () => number;

const SWEEP_THRESHOLD = 10_000;

/**
 * Fixed-window counter per key. `check` admits and counts in one synchronous
 * step, so concurrent requests on the event loop cannot overshoot `max`.
 */
export class RateLimiter {
    private buckets = new Map<string, Bucket>();

    constructor(
        private windowMs: number,
        private max: number,
        private now: Clock = Date.now
    ) { }

    private current(key: string, now: number): Bucket | undefined {
        const bucket = this.buckets.get(key);
        if (!bucket || bucket.resetAt <= now) {
            return undefined;
        }
        return bucket;
    }

    /** Whether one more hit on `key` would be admitted, without counting it. */
    canAdmit(key: string): boolean {
        const bucket = this.current(key, this.now());
        return !bucket || bucket.count < this.max;
    }

    check(key: string): boolean {
        const now = this.now();
        const bucket = this.current(key, now);

        if (!bucket) {
            if (this.buckets.size >= SWEEP_THRESHOLD) {
                this.sweep(now);
            }
            this.buckets.set(key, {
                count: 1,
                resetAt: now + this.windowMs
            });
            return this.max > 0;
        }

        if (bucket.count >= this.max) {
            return false;
        }

        bucket.count++;
        return true;
    }

    private sweep(now: number) {
        for (const [key, bucket] of this.buckets) {
            if (bucket.resetAt <= now) {
                this.buckets.delete(key);
            }
        }
    }
}

export interface RateWindow {
    windowMs: number;
    max: number;
}

/**
 * Several fixed windows over the same key (per minute, hour, day). A hit is
 * counted in every window only when all of them still have room.
 */
export class MultiWindowRateLimiter {
    private limiters: RateLimiter[];

    constructor(windows: RateWindow[], now: Clock = Date.now) {
        this.limiters = windows.map(
            (window) => new RateLimiter(window.windowMs, window.max, now)
        );
    }

    check(key: string): boolean {
        if (!this.limiters.every((limiter) => limiter.canAdmit(key))) {
            return false;
        }

        for (const limiter of this.limiters) {
            limiter.check(key);
        }
        return true;
    }
}
