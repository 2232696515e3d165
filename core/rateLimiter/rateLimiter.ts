type Bucket = {
    count: number;
    resetAt: number;
    blockedUntil: number;
};

// buckets are swept once the map grows past this
const SWEEP_THRESHOLD = 10_000;

/**
 * Fixed-window counter per key. A key that goes over `max` inside a window
 * stays blocked for `blockMs` (at least until the window ends).
 */
export class RateLimiter {
    private buckets = new Map<string, Bucket>();

    constructor(
        private windowMs: number,
        private max: number,
        private blockMs: number = 0,
        private now: () => number = Date.now
    ) { }

    check(key: string): boolean {
        const now = this.now();
        const bucket = this.buckets.get(key);

        if (bucket && bucket.blockedUntil > now) {
            return false;
        }

        if (!bucket || bucket.resetAt <= now || bucket.blockedUntil > 0) {
            if (this.buckets.size >= SWEEP_THRESHOLD) this.sweep(now);
            this.buckets.set(key, {
                count: 1,
                resetAt: now + this.windowMs,
                blockedUntil: 0
            });
            return true;
        }

        if (bucket.count >= this.max) {
            bucket.blockedUntil = Math.max(now + this.blockMs, bucket.resetAt);
            return false;
        }

        bucket.count++;
        return true;
    }

    get size(): number {
        return this.buckets.size;
    }

    private sweep(now: number) {
        for (const [key, bucket] of this.buckets) {
            if (bucket.resetAt <= now && bucket.blockedUntil <= now) {
                this.buckets.delete(key);
            }
        }
    }
}
