/**
 * Fixed-window request counter keyed by client. Windows that have expired are
 * dropped on the next hit, so idle clients do not accumulate.
 */
export class RateLimiter {
    private buckets: Map<string, { count: number; windowStart: number }> = new Map();

    constructor(private readonly maxRequests: number, private readonly windowMs: number) {}

    /**
     * Count a request from `key`; true when it is over the limit.
     */
    public hit(key: string, now: number): boolean {
        this.prune(now);

        const bucket = this.buckets.get(key);
        if (!bucket) {
            this.buckets.set(key, { count: 1, windowStart: now });
            return false;
        }

        bucket.count += 1;
        return bucket.count > this.maxRequests;
    }

    public get trackedClients(): number {
        return this.buckets.size;
    }

    private prune(now: number): void {
        for (const [key, bucket] of this.buckets) {
            if (now - bucket.windowStart >= this.windowMs) {
                this.buckets.delete(key);
            }
        }
    }
}
