import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../src/gateway/RateLimiter';

describe('RateLimiter', () => {
    it('allows up to the limit within one window', () => {
        const limiter = new RateLimiter(2, 60_000);

        expect(limiter.hit('10.0.0.1', 0)).toBe(false);
        expect(limiter.hit('10.0.0.1', 10)).toBe(false);
        expect(limiter.hit('10.0.0.1', 20)).toBe(true);
        expect(limiter.hit('10.0.0.2', 30)).toBe(false);
    });

    it('starts a fresh window once the old one expires', () => {
        const limiter = new RateLimiter(1, 60_000);

        limiter.hit('10.0.0.1', 0);
        expect(limiter.hit('10.0.0.1', 59_999)).toBe(true);
        expect(limiter.hit('10.0.0.1', 60_000)).toBe(false);
    });

    it('forgets clients whose window has expired', () => {
        const limiter = new RateLimiter(5, 60_000);

        limiter.hit('10.0.0.1', 0);
        limiter.hit('10.0.0.2', 1_000);
        limiter.hit('10.0.0.3', 2_000);
        expect(limiter.trackedClients).toBe(3);

        limiter.hit('10.0.0.4', 61_500);

        expect(limiter.trackedClients).toBe(2);
    });
});
